import { Injectable, Logger } from '@nestjs/common';
import {
  DEFAULT_FILTER_PRIORITY,
  type ContentFilterCallback,
  type ContentFilterEntry,
  type ContentTag,
} from './types';

type PriorityBuckets = Map<number, Map<string, ContentFilterEntry>>;

/**
 * Named filter pipelines for rendered content.
 *
 * Callbacks run by ascending priority, in registration order within one
 * priority. A callback may add or remove filters while the pipeline runs;
 * changes to later priorities apply to the current run.
 *
 * The application-wide instance holds plugin registrations. Request-scoped
 * consumers work on a `fork()` so their changes stay local.
 */
@Injectable()
export class ContentFilterRegistry {
  private readonly logger = new Logger('ContentFilterRegistry');
  private readonly tags = new Map<string, PriorityBuckets>();

  addFilter(
    tag: ContentTag,
    id: string,
    callback: ContentFilterCallback,
    priority = DEFAULT_FILTER_PRIORITY,
    acceptedArgs = 1,
  ): void {
    let buckets = this.tags.get(tag);
    if (!buckets) {
      buckets = new Map();
      this.tags.set(tag, buckets);
    }
    let bucket = buckets.get(priority);
    if (!bucket) {
      bucket = new Map();
      buckets.set(priority, bucket);
    }
    // re-adding an id at the same priority replaces it in place
    bucket.set(id, { id, callback, acceptedArgs: Math.max(1, acceptedArgs) });
  }

  /** Returns whether the filter was registered at that priority. */
  removeFilter(
    tag: ContentTag,
    id: string,
    priority = DEFAULT_FILTER_PRIORITY,
  ): boolean {
    const buckets = this.tags.get(tag);
    const bucket = buckets?.get(priority);
    if (!buckets || !bucket || !bucket.delete(id)) return false;
    if (bucket.size === 0) buckets.delete(priority);
    if (buckets.size === 0) this.tags.delete(tag);
    this.logger.debug(`removed ${tag}/${id}@${priority}`);
    return true;
  }

  /**
   * Without `id`: whether the tag has any filter.
   * With `id`: the lowest priority it is registered at, or `false`.
   */
  hasFilter(tag: ContentTag): boolean;
  hasFilter(tag: ContentTag, id: string): number | false;
  hasFilter(tag: ContentTag, id?: string): boolean | number {
    const buckets = this.tags.get(tag);
    if (!buckets) return false;
    if (id === undefined) return buckets.size > 0;
    for (const priority of sortedPriorities(buckets)) {
      if (buckets.get(priority)?.has(id)) return priority;
    }
    return false;
  }

  applyFilters(tag: ContentTag, value: string, ...args: unknown[]): string {
    let current = value;
    let last = Number.NEGATIVE_INFINITY;

    for (;;) {
      const buckets = this.tags.get(tag);
      if (!buckets) break;
      const next = sortedPriorities(buckets).find((p) => p > last);
      if (next === undefined) break;
      last = next;

      const bucket = buckets.get(next);
      if (!bucket) continue;
      for (const entry of Array.from(bucket.values())) {
        // skip entries removed by an earlier callback at this priority
        if (bucket.get(entry.id) !== entry) continue;
        current = entry.callback(current, ...args.slice(0, entry.acceptedArgs - 1));
      }
    }
    return current;
  }

  /** Copy of every registration; later changes on either side stay separate. */
  fork(): ContentFilterRegistry {
    const copy = new ContentFilterRegistry();
    for (const [tag, buckets] of this.tags) {
      for (const [priority, bucket] of buckets) {
        for (const entry of bucket.values()) {
          copy.addFilter(tag, entry.id, entry.callback, priority, entry.acceptedArgs);
        }
      }
    }
    return copy;
  }
}

function sortedPriorities(buckets: PriorityBuckets): number[] {
  return Array.from(buckets.keys()).sort((a, b) => a - b);
}
