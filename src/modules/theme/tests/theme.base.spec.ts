import {
  COLOR_FIELD,
  FakeFieldProvider,
  FakeUserStore,
  requestContext,
} from '../../../../test/helpers/fakes';
import type { FieldChoice } from '../../../lib/fields/types';
import type { RequestContext } from '../../../lib/request/request-context';
import type { UserRecord } from '../../../lib/users/types';
import { ContentFilterRegistry } from '../../content-filters/content-filter.registry';
import {
  SHARING_LINKS_MARKUP,
  SharingDisplayFilter,
} from '../../content-filters/sharing-display.filter';
import { ThemeBase, type ThemeDependencies } from '../theme.base';

/** Exposes the protected helpers. */
class TestTheme extends ThemeBase {
  constructor(deps: ThemeDependencies) {
    super(deps);
  }

  choices(fieldId: string): Promise<ReadonlyArray<FieldChoice>> {
    return this.getSelectFieldChoices(fieldId);
  }

  users(
    fields: string[],
    key: string,
    compare: string,
    value: string | number,
    orderBy?: string,
    order?: string,
  ): Promise<UserRecord[] | null> {
    return this.getUserData(fields, key, compare, value, orderBy, order);
  }

  suppress(): void {
    this.suppressSharingLinks();
  }
}

function makeTheme(
  over: {
    fields?: FakeFieldProvider;
    store?: FakeUserStore;
    request?: RequestContext;
    filters?: ContentFilterRegistry;
  } = {},
) {
  const fields = over.fields ?? new FakeFieldProvider([COLOR_FIELD]);
  const store = over.store ?? new FakeUserStore();
  const filters = over.filters ?? new ContentFilterRegistry();
  const theme = new TestTheme({
    fields,
    store,
    request: over.request ?? requestContext('/'),
    filters,
  });
  return { theme, fields, store, filters } as const;
}

describe('ThemeBase', () => {
  describe('getSelectFieldChoices', () => {
    it('returns the field choices and looks them up once', async () => {
      const { theme, fields } = makeTheme();

      const first = await theme.choices('favorite_color');
      const second = await theme.choices('favorite_color');

      expect(first).toEqual([
        { value: '1', label: 'Red' },
        { value: '2', label: 'Blue' },
      ]);
      expect(second).toBe(first);
      expect(fields.calls.get('favorite_color')).toBe(1);
    });

    it('returns [] for an unknown field, also memoized', async () => {
      const { theme, fields } = makeTheme();

      expect(await theme.choices('nope')).toEqual([]);
      expect(await theme.choices('nope')).toEqual([]);
      expect(fields.calls.get('nope')).toBe(1);
    });

    it('returns [] for a field without choices', async () => {
      const fields = new FakeFieldProvider([
        { key: 'bio', label: 'Bio', type: 'textarea' },
      ]);
      const { theme } = makeTheme({ fields });

      expect(await theme.choices('bio')).toEqual([]);
    });

    it('does not share the cache between instances', async () => {
      const fields = new FakeFieldProvider([COLOR_FIELD]);
      await makeTheme({ fields }).theme.choices('favorite_color');
      await makeTheme({ fields }).theme.choices('favorite_color');

      expect(fields.calls.get('favorite_color')).toBe(2);
    });
  });

  describe('options', () => {
    it('getOption compares loosely', () => {
      const { theme } = makeTheme();

      expect(theme.getOption('1', 'One', 1)).toBe(
        '<option value="1" selected="selected">One</option>',
      );
      expect(theme.getOption('1', 'One', '2')).toBe(
        '<option value="1">One</option>',
      );
    });

    it('printOption buffers markup until flushed', () => {
      const { theme } = makeTheme();

      theme.printOption('1', 'Red', '2');
      theme.printOption(2, 'Blue', '2');

      expect(theme.flushOutput()).toBe(
        '<option value="1">Red</option><option value="2" selected="selected">Blue</option>',
      );
      expect(theme.flushOutput()).toBe('');
    });
  });

  describe('getUserData', () => {
    it('fails closed on an unknown operator without querying', async () => {
      const { theme, store } = makeTheme();

      for (const op of ['==', 'IN', 'not like', '; DROP TABLE wp_users']) {
        await expect(theme.users(['user_email'], 'nickname', op, 'x')).resolves.toBeNull();
      }
      expect(store.queries).toHaveLength(0);
    });

    it('queries once and maps rows to string records', async () => {
      const store = new FakeUserStore([
        { ID: 1, user_email: 'ada@example.test', nickname: 'ada' },
        { ID: 2, user_email: 'grace@example.test', nickname: null },
      ]);
      const { theme } = makeTheme({ store });

      const users = await theme.users(['user_email'], 'nickname', 'LIKE', '%a%');

      expect(users).toEqual([
        { ID: '1', user_email: 'ada@example.test', nickname: 'ada' },
        { ID: '2', user_email: 'grace@example.test', nickname: '' },
      ]);
      expect(store.queries).toHaveLength(1);
      expect(store.queries[0]).toContain(
        "WHERE `meta_0`.`meta_value` LIKE '%a%'",
      );
      expect(store.queries[0]?.endsWith('ORDER BY `wp_users`.`ID` ASC')).toBe(
        true,
      );
    });

    it('returns [] when nothing matches and re-queries every call', async () => {
      const { theme, store } = makeTheme();

      expect(await theme.users([], 'user_status', '=', 0, 'RAND')).toEqual([]);
      expect(await theme.users([], 'user_status', '=', 0, 'RAND')).toEqual([]);
      expect(store.queries).toHaveLength(2);
      expect(store.queries[0]?.endsWith('ORDER BY RAND()')).toBe(true);
      expect(store.queries[0]).toContain(
        "WHERE `wp_users`.`user_status` = '0'",
      );
    });

    it('propagates store failures', async () => {
      const store = new FakeUserStore();
      store.getResults = () => Promise.reject(new Error('connection lost'));
      const { theme } = makeTheme({ store });

      await expect(theme.users([], 'ID', '=', 1)).rejects.toThrow(
        'connection lost',
      );
    });
  });

  describe('segments', () => {
    it('returns every segment, or one by zero-based index', () => {
      const { theme } = makeTheme({ request: requestContext('/a/b/c?x=1') });

      expect(theme.segments()).toEqual(['a', 'b', 'c']);
      expect(theme.segments(0)).toBe('a');
      expect(theme.segments(1)).toBe('b');
      expect(theme.segments(5)).toBeNull();
      expect(theme.segments(-1)).toBeNull();
      expect(theme.segments(1.5)).toBeNull();
    });

    it('parses the path once per instance', () => {
      const { theme } = makeTheme({ request: requestContext('/blog/2024') });

      expect(theme.segments()).toBe(theme.segments());
    });
  });

  describe('useWrapper', () => {
    it.each<[Record<string, unknown>, boolean]>([
      [{ ajax: 'true' }, false],
      [{ ajax: 'TRUE' }, true],
      [{ ajax: '1' }, true],
      [{ ajax: ['true'] }, true],
      [{}, true],
    ])('query %p -> %p', (query, expected) => {
      const { theme } = makeTheme({ request: requestContext('/', query) });

      expect(theme.useWrapper()).toBe(expected);
    });
  });

  describe('sharing link suppression', () => {
    function withSharing(): ContentFilterRegistry {
      const filters = new ContentFilterRegistry();
      new SharingDisplayFilter(filters).onModuleInit();
      return filters;
    }

    it('leaves sharing links in place until suppressed', () => {
      const { filters } = makeTheme({ filters: withSharing() });

      expect(filters.applyFilters('the_content', 'Hello')).toBe(
        `Hello\n${SHARING_LINKS_MARKUP}`,
      );
    });

    it('removes sharing links from content and excerpts', () => {
      const { theme, filters } = makeTheme({ filters: withSharing() });

      theme.suppress();

      expect(filters.hasFilter('the_content', 'theme:filter_the_content')).toBe(10);
      expect(filters.applyFilters('the_content', 'Hello')).toBe('Hello');
      expect(filters.applyFilters('the_excerpt', 'Short')).toBe('Short');
      expect(filters.hasFilter('the_content', 'sharing_display')).toBe(false);
      expect(filters.hasFilter('the_excerpt', 'sharing_display')).toBe(false);
    });

    it('filter callbacks return their input unchanged', () => {
      const { theme, filters } = makeTheme({ filters: withSharing() });

      expect(theme.filterTheContent('<p>x</p>')).toBe('<p>x</p>');
      expect(filters.hasFilter('the_content', 'sharing_display')).toBe(false);
      expect(filters.hasFilter('the_excerpt', 'sharing_display')).toBe(19);
    });
  });
});
