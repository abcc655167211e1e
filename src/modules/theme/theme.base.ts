import { Logger } from '@nestjs/common';
import { LookupCache } from '../../lib/cache/lookup-cache';
import type {
  FieldChoice,
  FieldDefinitionProvider,
} from '../../lib/fields/types';
import { renderOption, type OptionScalar } from '../../lib/html/option';
import {
  pathSegments,
  type RequestContext,
} from '../../lib/request/request-context';
import type { UserDataStore, UserRecord } from '../../lib/users/types';
import {
  buildUserQuery,
  renderUserQuery,
  toUserRecord,
} from '../../lib/users/user-query';
import type { ContentFilterRegistry } from '../content-filters/content-filter.registry';
import {
  CONTENT_TAGS,
  SHARING_DISPLAY_ID,
  SHARING_DISPLAY_PRIORITY,
} from '../content-filters/types';

export interface ThemeDependencies {
  readonly fields: FieldDefinitionProvider;
  readonly store: UserDataStore;
  readonly request: RequestContext;
  /** Registry owned by this instance (not the application-wide one). */
  readonly filters: ContentFilterRegistry;
}

/** Cache namespaces used by ThemeBase. */
export const THEME_CACHE = Object.freeze({
  fieldOptions: 'field_options',
  segments: 'segments',
} as const);

/**
 * Reusable helpers for theme objects.
 *
 * One instance serves one request: lookups are memoized for the lifetime of
 * the instance and never refreshed.
 */
export abstract class ThemeBase {
  protected readonly cache = new LookupCache();
  protected readonly logger = new Logger(this.constructor.name);
  private output: string[] = [];

  protected constructor(protected readonly deps: ThemeDependencies) {}

  /**
   * Choices of a select-type custom field, `[]` when the field is unknown
   * or has none. Looked up once per field id.
   */
  protected getSelectFieldChoices(
    fieldId: string,
  ): Promise<ReadonlyArray<FieldChoice>> {
    return this.cache.getOrComputeAsync(
      THEME_CACHE.fieldOptions,
      fieldId,
      async () => {
        const field = await this.deps.fields.getDefinition(fieldId);
        return field?.choices ?? [];
      },
    );
  }

  /** `<option>` markup, selected when `value` loosely equals `current`. */
  public getOption(
    value: OptionScalar,
    text: OptionScalar,
    current: OptionScalar,
  ): string {
    return renderOption(value, text, current);
  }

  /** Append an `<option>` to this instance's output buffer. */
  public printOption(
    value: OptionScalar,
    text: OptionScalar,
    current: OptionScalar,
  ): void {
    this.output.push(this.getOption(value, text, current));
  }

  /** Everything printed so far; empties the buffer. */
  public flushOutput(): string {
    const out = this.output.join('');
    this.output = [];
    return out;
  }

  /**
   * Users matching one attribute filter, with the requested attributes.
   *
   * Core columns come from the users table; every other attribute is joined
   * from usermeta. The filter and sort attributes are always selected.
   * Returns `null` (without querying) when `compare` is not an allowed
   * operator. Results are not cached.
   */
  protected async getUserData(
    fields: ReadonlyArray<string>,
    key: string,
    compare: string,
    value: string | number,
    orderBy = 'ID',
    order = 'ASC',
  ): Promise<UserRecord[] | null> {
    const { store } = this.deps;
    const ast = buildUserQuery(
      { fields, filter: { key, compare, value }, sort: { orderBy, order } },
      store.tables,
      store,
    );
    if (!ast) {
      this.logger.warn(`rejected comparison operator: ${compare}`);
      return null;
    }

    const rows = await store.getResults(renderUserQuery(ast));
    return rows.map(toUserRecord);
  }

  /** All non-empty path segments of the request URI. */
  public segments(): ReadonlyArray<string>;
  /** The segment at zero-based `index`, or `null`. */
  public segments(index: number): string | null;
  public segments(index?: number): ReadonlyArray<string> | string | null {
    const all = this.cache.getOrCompute(THEME_CACHE.segments, 'all', () =>
      Object.freeze(pathSegments(this.deps.request.uri)),
    );
    if (index === undefined) return all;
    if (!Number.isInteger(index) || index < 0) return null;
    return all[index] ?? null;
  }

  /** `false` only for `?ajax=true` (exact, case-sensitive). */
  public useWrapper(): boolean {
    return this.deps.request.query.ajax !== 'true';
  }

  /**
   * Hook the content and excerpt pipelines so the sharing plugin's
   * auto-injected links are unregistered before they run.
   */
  protected suppressSharingLinks(): void {
    const { filters } = this.deps;
    filters.addFilter(CONTENT_TAGS.content, 'theme:filter_the_content', (c) =>
      this.filterTheContent(c),
    );
    filters.addFilter(CONTENT_TAGS.excerpt, 'theme:filter_the_excerpt', (e) =>
      this.filterTheExcerpt(e),
    );
  }

  public filterTheContent(content: string): string {
    this.deps.filters.removeFilter(
      CONTENT_TAGS.content,
      SHARING_DISPLAY_ID,
      SHARING_DISPLAY_PRIORITY,
    );
    return content;
  }

  public filterTheExcerpt(excerpt: string): string {
    this.deps.filters.removeFilter(
      CONTENT_TAGS.excerpt,
      SHARING_DISPLAY_ID,
      SHARING_DISPLAY_PRIORITY,
    );
    return excerpt;
  }
}
