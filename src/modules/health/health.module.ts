import { Module } from '@nestjs/common';
import { WpdbModule } from '../wpdb/wpdb.module';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

@Module({
  imports: [WpdbModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
