import { Module } from '@nestjs/common';
import { loadWpdbConfig } from '../../infra/wpdb/wpdb.config';
import { WPDB_CONFIG } from './wpdb.constants';
import { WpdbService } from './wpdb.service';

/**
 * Internal-only module around the WordPress MySQL database.
 * No controllers; other modules consume WpdbService.
 */
@Module({
  providers: [
    { provide: WPDB_CONFIG, useFactory: () => loadWpdbConfig() },
    WpdbService,
  ],
  exports: [WpdbService],
})
export class WpdbModule {}
