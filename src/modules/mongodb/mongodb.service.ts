import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import type { Collection, Db, Document } from 'mongodb';
import type { MongoConfig } from '../../infra/mongo/mongo.config';
import { StoreActionError } from '../../lib/errors/StoreActionError';
import { isNonEmptyString } from '../../lib/utils/strings';
import { LazyMongoClient } from './internal/mongodb.client';
import { MONGO_CONFIG } from './mongodb.constants';

@Injectable()
export class MongodbService implements OnModuleDestroy {
  private readonly client: LazyMongoClient;

  constructor(@Inject(MONGO_CONFIG) private readonly cfg: MongoConfig) {
    this.client = new LazyMongoClient(cfg);
  }

  /**
   * Connected native driver Db handle; defaults to the configured database.
   */
  public async getDb(dbName?: string): Promise<Db> {
    const name = dbName ?? this.cfg.dbName;
    try {
      return await this.client.getDb(name);
    } catch (err) {
      throw StoreActionError.wrap(err, {
        store: 'mongodb',
        operation: 'connect',
        dbName: name,
      });
    }
  }

  /** Native driver Collection<T>; no schema enforcement here. */
  public async getCollection<T extends Document = Document>(
    collection: string,
    dbName?: string,
  ): Promise<Collection<T>> {
    const name = dbName ?? this.cfg.dbName;
    if (!isNonEmptyString(collection)) {
      throw new StoreActionError('Collection name must be a non-empty string', {
        store: 'mongodb',
        operation: 'getCollection',
        dbName: name,
        argsPreview: { collection: String(collection) },
      });
    }
    const db = await this.getDb(name);
    return db.collection<T>(collection);
  }

  public async onModuleDestroy(): Promise<void> {
    await this.client.close();
  }
}
