import type {
  FieldDefinition,
  FieldDefinitionProvider,
} from '../../src/lib/fields/types';
import type { RequestContext } from '../../src/lib/request/request-context';
import type { SqlDialect, UserDataStore } from '../../src/lib/users/types';

/** MySQL-style quoting, enough to assert on rendered SQL. */
export const testDialect: SqlDialect = {
  escapeId: (identifier) => '`' + identifier.replace(/`/g, '``') + '`',
  escape: (value) =>
    typeof value === 'number'
      ? String(value)
      : "'" + value.replace(/\\/g, '\\\\').replace(/'/g, "\\'") + "'",
};

/** Records every query and answers with canned rows. */
export class FakeUserStore implements UserDataStore {
  public readonly tables = { users: 'wp_users', usermeta: 'wp_usermeta' };
  public readonly queries: string[] = [];

  constructor(public rows: ReadonlyArray<Record<string, unknown>> = []) {}

  escapeId(identifier: string): string {
    return testDialect.escapeId(identifier);
  }

  escape(value: string | number): string {
    return testDialect.escape(value);
  }

  getResults(sql: string): Promise<ReadonlyArray<Record<string, unknown>>> {
    this.queries.push(sql);
    return Promise.resolve(this.rows);
  }

  describe(): { database: string; tablePrefix: string } {
    return { database: 'wordpress_test', tablePrefix: 'wp_' };
  }
}

/** In-memory field definitions with a per-key lookup counter. */
export class FakeFieldProvider implements FieldDefinitionProvider {
  public readonly calls = new Map<string, number>();
  private readonly defs = new Map<string, FieldDefinition>();

  constructor(defs: ReadonlyArray<FieldDefinition> = []) {
    for (const d of defs) this.defs.set(d.key, d);
  }

  getDefinition(key: string): Promise<FieldDefinition | null> {
    this.calls.set(key, (this.calls.get(key) ?? 0) + 1);
    return Promise.resolve(this.defs.get(key) ?? null);
  }
}

export function requestContext(
  uri: string,
  query: Record<string, unknown> = {},
): RequestContext {
  return { uri, query };
}

export const COLOR_FIELD: FieldDefinition = {
  key: 'favorite_color',
  label: 'Favorite color',
  type: 'select',
  choices: [
    { value: '1', label: 'Red' },
    { value: '2', label: 'Blue' },
  ],
};
