/** Pipelines theme code filters. Other tags are allowed. */
export type ContentTag = 'the_content' | 'the_excerpt' | (string & {});

export const CONTENT_TAGS = Object.freeze({
  content: 'the_content',
  excerpt: 'the_excerpt',
} as const);

export type ContentKind = keyof typeof CONTENT_TAGS;

export const DEFAULT_FILTER_PRIORITY = 10;

/** Callback id and priority of the sharing plugin's auto-injected links. */
export const SHARING_DISPLAY_ID = 'sharing_display';
export const SHARING_DISPLAY_PRIORITY = 19;

/**
 * A content filter receives the current value plus up to `acceptedArgs - 1`
 * extra arguments and returns the new value.
 */
export type ContentFilterCallback = (value: string, ...args: unknown[]) => string;

export interface ContentFilterEntry {
  readonly id: string;
  readonly callback: ContentFilterCallback;
  readonly acceptedArgs: number;
}
