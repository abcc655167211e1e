import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { MongodbService } from '../../mongodb/mongodb.service';
import {
  FIELDS_COLLECTION,
  type FieldDocBase,
} from '../../../lib/fields/types';
import { StoreActionError } from '../../../lib/errors/StoreActionError';

/**
 * Index bootstrap for the `fields` collection: one definition per key.
 * Skipped on CI and when FIELDS_BOOTSTRAP=0.
 */
@Injectable()
export class FieldsBootstrap implements OnModuleInit {
  private readonly logger = new Logger(FieldsBootstrap.name);

  constructor(private readonly mongo: MongodbService) {}

  public async onModuleInit(): Promise<void> {
    if (!shouldRunBootstrap()) {
      this.logger.log('Skipping fields bootstrap (CI or disabled by env).');
      return;
    }

    try {
      const coll =
        await this.mongo.getCollection<FieldDocBase>(FIELDS_COLLECTION);
      await coll.createIndex(
        { key: 1 },
        { unique: true, name: 'uniq_fields_key' },
      );
      this.logger.log('Fields bootstrap complete.');
    } catch (err) {
      throw StoreActionError.wrap(err, {
        store: 'mongodb',
        operation: 'fieldsBootstrap',
        target: FIELDS_COLLECTION,
      });
    }
  }
}

export function shouldRunBootstrap(env: NodeJS.ProcessEnv = process.env): boolean {
  const ci = String(env.CI ?? '').toLowerCase();
  if (ci === 'true' || ci === '1') return false;
  const flag = String(env.FIELDS_BOOTSTRAP ?? '1');
  return flag !== '0' && flag.toLowerCase() !== 'false';
}
