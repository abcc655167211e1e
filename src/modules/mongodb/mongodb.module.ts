import { Module } from '@nestjs/common';
import { loadMongoConfig } from '../../infra/mongo/mongo.config';
import { MONGO_CONFIG } from './mongodb.constants';
import { MongodbService } from './mongodb.service';

/**
 * Internal-only MongoDB module backing the field-definition store.
 * No controllers; exports the service for other modules.
 */
@Module({
  providers: [
    { provide: MONGO_CONFIG, useFactory: () => loadMongoConfig() },
    MongodbService,
  ],
  exports: [MongodbService],
})
export class MongodbModule {}
