import { AppError } from './AppError';

/** Backing stores the service talks to. */
export type StoreKind = 'mysql' | 'mongodb';

/**
 * Operation names recorded on store errors.
 * Open-ended on purpose (string intersection) so new call sites need no edit here.
 */
export type StoreOperation =
  | 'getResults'
  | 'connect'
  | 'fields.list'
  | 'fields.getByKey'
  | 'fields.save'
  | 'fields.deleteByKey'
  | (string & {});

export interface StoreErrorContext {
  readonly store: StoreKind;
  readonly operation: StoreOperation;
  /** Database (schema) name, when known. */
  readonly dbName?: string;
  /** Table or collection involved. */
  readonly target?: string;
  /** Sanitized preview of the arguments; never full payloads. */
  readonly argsPreview?: Readonly<Record<string, unknown>>;
  /** Driver error code (e.g. `ER_NO_SUCH_TABLE`, or a Mongo server code). */
  readonly driverCode?: number | string;
}

/**
 * Failure while talking to MySQL or MongoDB.
 * Carries the driver error as `originalError` plus a small, log-safe context.
 */
export class StoreActionError extends AppError {
  public readonly name = 'StoreActionError' as const;
  public readonly context: Readonly<StoreErrorContext>;
  private readonly originalError?: Error;

  constructor(message: string, context: StoreErrorContext, cause?: Error) {
    super(message, 'STORE_ACTION_FAILED');
    this.context = Object.freeze({ ...context });
    this.originalError = cause;
  }

  public summary(): string {
    const parts: string[] = [
      `store=${this.context.store}`,
      `op=${this.context.operation}`,
    ];
    if (this.context.dbName) parts.push(`db=${this.context.dbName}`);
    if (this.context.target) parts.push(`target=${this.context.target}`);
    if (this.context.driverCode !== undefined) {
      parts.push(`driverCode=${String(this.context.driverCode)}`);
    }
    return `Store action failed: ${parts.join(' ')}`;
  }

  public toJSON(): {
    name: string;
    message: string;
    context: StoreErrorContext;
    cause?: { name: string; message: string };
  } {
    const c = this.originalError;
    return {
      name: this.name,
      message: this.message,
      context: this.context,
      cause: c ? { name: c.name, message: c.message } : undefined,
    };
  }

  /**
   * Wrap anything thrown by a driver. An existing StoreActionError is
   * returned untouched so nested wraps keep the innermost context.
   */
  public static wrap(
    err: unknown,
    context: StoreErrorContext,
    fallbackMessage = 'Store action failed',
  ): StoreActionError {
    if (err instanceof StoreActionError) {
      return err;
    }
    const { message, driverCode } = extractDriverDetails(err);
    return new StoreActionError(
      message ?? fallbackMessage,
      { ...context, driverCode: context.driverCode ?? driverCode },
      err instanceof Error ? err : undefined,
    );
  }
}

/** mysql2 and the Mongo driver both expose `message` and a `code`. */
function extractDriverDetails(err: unknown): {
  message?: string;
  driverCode?: number | string;
} {
  if (!err || typeof err !== 'object') return {};
  const message =
    'message' in err && typeof err.message === 'string' && err.message
      ? err.message
      : undefined;
  const code =
    'code' in err &&
    (typeof err.code === 'number' || typeof err.code === 'string')
      ? err.code
      : undefined;
  return { message, driverCode: code };
}
