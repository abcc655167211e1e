import {
  RANDOM_ORDER,
  isComparisonOperator,
  isUserCoreColumn,
  type ComparisonOperator,
  type SortDirection,
  type SqlDialect,
  type UserQueryRequest,
  type UserRecord,
} from './types';

/**
 * A user query broken into parts. Every string fragment below is already
 * escaped by the dialect; rendering only concatenates.
 */
export interface UserQueryAst {
  /** Final field set, de-duplicated, in request order (unescaped names). */
  readonly fields: ReadonlyArray<string>;
  readonly select: ReadonlyArray<string>;
  readonly from: string;
  readonly joins: ReadonlyArray<MetaJoin>;
  readonly where: WhereClause;
  readonly orderBy: OrderClause;
}

export interface MetaJoin {
  readonly field: string;
  /** `SELECT user_id, meta_value FROM usermeta WHERE meta_key = <literal>` */
  readonly subquery: string;
  readonly alias: string;
  readonly on: string;
}

export interface WhereClause {
  readonly column: string;
  readonly operator: ComparisonOperator;
  readonly literal: string;
}

export type OrderClause =
  | { readonly kind: 'random' }
  | {
      readonly kind: 'column';
      readonly column: string;
      readonly direction: SortDirection;
    };

export interface UserQueryTables {
  readonly users: string;
  readonly usermeta: string;
}

export const DEFAULT_USER_SORT = Object.freeze({
  orderBy: 'ID',
  order: 'ASC',
} as const);

function normalizeDirection(order: string): SortDirection {
  return order.trim().toUpperCase() === 'DESC' ? 'DESC' : 'ASC';
}

function uniqueFields(fields: ReadonlyArray<string>): string[] {
  return Array.from(new Set(fields));
}

/**
 * Build the query for `request`, or `null` when the comparison operator is
 * not allowed.
 */
export function buildUserQuery(
  request: UserQueryRequest,
  tables: UserQueryTables,
  dialect: SqlDialect,
): UserQueryAst | null {
  const { filter } = request;
  const sort = request.sort ?? DEFAULT_USER_SORT;

  const operator = filter.compare;
  if (!isComparisonOperator(operator)) {
    return null;
  }

  const fields = [...request.fields];
  if (!fields.includes(filter.key)) {
    fields.push(filter.key);
  }
  const random = sort.orderBy === RANDOM_ORDER;
  if (!random && !fields.includes(sort.orderBy)) {
    fields.push(sort.orderBy);
  }
  const finalFields = uniqueFields(fields);

  const usersTable = dialect.escapeId(tables.users);
  const metaTable = dialect.escapeId(tables.usermeta);
  const userId = `${usersTable}.${dialect.escapeId('ID')}`;

  // positional aliases: meta keys can outgrow the 64-character identifier limit
  const metaAliases = new Map<string, string>();
  for (const field of finalFields) {
    if (field !== 'ID' && !isUserCoreColumn(field)) {
      metaAliases.set(field, dialect.escapeId(`meta_${metaAliases.size}`));
    }
  }
  const columnOf = (field: string): string => {
    const alias = metaAliases.get(field);
    return alias === undefined
      ? `${usersTable}.${dialect.escapeId(field)}`
      : `${alias}.${dialect.escapeId('meta_value')}`;
  };

  const select = [`DISTINCT(${userId}) AS ${dialect.escapeId('ID')}`];
  const joins: MetaJoin[] = [];
  for (const field of finalFields) {
    if (field === 'ID') continue;
    const alias = metaAliases.get(field);
    if (alias === undefined) {
      select.push(columnOf(field));
      continue;
    }

    select.push(`${columnOf(field)} AS ${dialect.escapeId(field)}`);
    joins.push({
      field,
      subquery:
        `SELECT ${dialect.escapeId('user_id')}, ${dialect.escapeId('meta_value')}` +
        ` FROM ${metaTable}` +
        ` WHERE ${dialect.escapeId('meta_key')} = ${dialect.escape(field)}`,
      alias,
      on: `${userId} = ${alias}.${dialect.escapeId('user_id')}`,
    });
  }

  const orderBy: OrderClause = random
    ? { kind: 'random' }
    : {
        kind: 'column',
        column: columnOf(sort.orderBy),
        direction: normalizeDirection(sort.order),
      };

  return {
    fields: finalFields,
    select,
    from: usersTable,
    joins,
    where: {
      column: columnOf(filter.key),
      operator,
      // meta_value is text: always compare against a string literal
      literal: dialect.escape(String(filter.value)),
    },
    orderBy,
  };
}

/** Join the escaped fragments of `ast` into SQL text. */
export function renderUserQuery(ast: UserQueryAst): string {
  const lines = [`SELECT ${ast.select.join(', ')}`, `FROM ${ast.from}`];
  for (const join of ast.joins) {
    lines.push(`INNER JOIN (${join.subquery}) AS ${join.alias} ON ${join.on}`);
  }
  lines.push(
    `WHERE ${ast.where.column} ${ast.where.operator} ${ast.where.literal}`,
  );
  lines.push(
    ast.orderBy.kind === 'random'
      ? 'ORDER BY RAND()'
      : `ORDER BY ${ast.orderBy.column} ${ast.orderBy.direction}`,
  );
  return lines.join('\n');
}

/** Stringify a driver row; `null` columns become empty strings. */
export function toUserRecord(row: Record<string, unknown>): UserRecord {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(row)) {
    if (value == null) out[key] = '';
    else if (value instanceof Date) out[key] = value.toISOString();
    else out[key] = String(value);
  }
  return out;
}
