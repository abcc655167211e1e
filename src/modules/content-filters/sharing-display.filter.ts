import { Injectable, OnModuleInit } from '@nestjs/common';
import { ContentFilterRegistry } from './content-filter.registry';
import {
  CONTENT_TAGS,
  SHARING_DISPLAY_ID,
  SHARING_DISPLAY_PRIORITY,
} from './types';

export const SHARING_LINKS_MARKUP =
  '<div class="sharedaddy sd-sharing-enabled"><h3 class="sd-title">Share this:</h3></div>';

/**
 * Stand-in for the sharing plugin: appends its share block to content and
 * excerpts at priority 19, the way the plugin does on a live site.
 */
@Injectable()
export class SharingDisplayFilter implements OnModuleInit {
  constructor(private readonly registry: ContentFilterRegistry) {}

  onModuleInit(): void {
    for (const tag of Object.values(CONTENT_TAGS)) {
      this.registry.addFilter(
        tag,
        SHARING_DISPLAY_ID,
        (text) => appendSharingLinks(text),
        SHARING_DISPLAY_PRIORITY,
      );
    }
  }
}

export function appendSharingLinks(text: string): string {
  return `${text}\n${SHARING_LINKS_MARKUP}`;
}
