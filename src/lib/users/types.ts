/**
 * Comparison operators accepted in a user filter.
 * Anything outside this list makes the query fail closed.
 */
export const COMPARISON_OPERATORS = Object.freeze([
  '=',
  '!=',
  '>',
  '>=',
  '<',
  '<=',
  'LIKE',
  'NOT LIKE',
] as const);

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export function isComparisonOperator(
  value: unknown,
): value is ComparisonOperator {
  return (
    typeof value === 'string' &&
    (COMPARISON_OPERATORS as ReadonlyArray<string>).includes(value)
  );
}

/** Columns stored on the users table itself; every other field lives in usermeta. */
export const USER_CORE_COLUMNS = Object.freeze([
  'ID',
  'user_login',
  'user_nicename',
  'user_email',
  'user_url',
  'user_registered',
  'user_status',
  'display_name',
] as const);

export type UserCoreColumn = (typeof USER_CORE_COLUMNS)[number];

export function isUserCoreColumn(value: string): value is UserCoreColumn {
  return (USER_CORE_COLUMNS as ReadonlyArray<string>).includes(value);
}

/** Sort sentinel that requests `ORDER BY RAND()`. */
export const RANDOM_ORDER = 'RAND' as const;

export type SortDirection = 'ASC' | 'DESC';

export interface UserFilter {
  readonly key: string;
  readonly compare: string;
  readonly value: string | number;
}

export interface UserSort {
  /** Field name, or `RAND` for random order. */
  readonly orderBy: string;
  /** `ASC` or `DESC`; anything else sorts ascending. */
  readonly order: string;
}

export interface UserQueryRequest {
  readonly fields: ReadonlyArray<string>;
  readonly filter: UserFilter;
  readonly sort?: UserSort;
}

/** One user row, every value stringified. Always carries `ID`. */
export type UserRecord = Readonly<Record<string, string>>;

/**
 * Escaping primitives of the relational store. Both return text ready to
 * paste into SQL: `escapeId` a quoted identifier, `escape` a quoted literal.
 */
export interface SqlDialect {
  escapeId(identifier: string): string;
  escape(value: string | number): string;
}

/** The relational store as seen by the query builder. */
export interface UserDataStore extends SqlDialect {
  readonly tables: {
    readonly users: string;
    readonly usermeta: string;
  };
  getResults(sql: string): Promise<ReadonlyArray<Record<string, unknown>>>;
}
