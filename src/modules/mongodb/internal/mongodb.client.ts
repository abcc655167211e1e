import { MongoClient, type Db, type MongoClientOptions } from 'mongodb';
import type { MongoConfig } from '../../../infra/mongo/mongo.config';

/**
 * Lazy MongoDB client.
 * - Single connect attempt at a time is deduplicated.
 * - A failed connect resets state so the next call can retry.
 * - close() during a connect closes the late client.
 */
export class LazyMongoClient {
  private client?: MongoClient;
  private connecting?: Promise<MongoClient>;

  constructor(private readonly cfg: MongoConfig) {}

  public async getClient(): Promise<MongoClient> {
    const existing: MongoClient | undefined = this.client;
    if (existing) return existing;

    const inflight: Promise<MongoClient> | undefined = this.connecting;
    if (inflight) return inflight;

    const options: MongoClientOptions = {
      ignoreUndefined: true,
      serverSelectionTimeoutMS: this.cfg.serverSelectionTimeoutMs,
    };

    const connect = async (): Promise<MongoClient> => {
      const created = new MongoClient(this.cfg.uri, options);
      await created.connect();
      if (this.connecting !== connectPromise) {
        // close() ran while this connect was in flight
        await created.close();
        throw new Error('Mongo client closed while connecting');
      }
      this.client = created;
      this.connecting = undefined;
      return created;
    };
    const connectPromise: Promise<MongoClient> = connect();

    this.connecting = connectPromise;

    try {
      return await connectPromise;
    } catch (err) {
      if (this.connecting === connectPromise) {
        this.connecting = undefined;
        this.client = undefined;
      }
      throw err;
    }
  }

  public async getDb(dbName?: string): Promise<Db> {
    const client: MongoClient = await this.getClient();
    return client.db(dbName ?? this.cfg.dbName);
  }

  /**
   * Close the client (idempotent). A connect still in flight is waited for
   * and its client closed, so nothing stays open after shutdown.
   */
  public async close(): Promise<void> {
    const current: MongoClient | undefined = this.client;
    const pending: Promise<MongoClient> | undefined = this.connecting;
    this.client = undefined;
    this.connecting = undefined;
    if (current) await current.close();
    if (pending) {
      // the connect's own caller receives its error
      await pending.then(
        () => undefined,
        () => undefined,
      );
    }
  }
}
