import { Inject, Injectable, Scope } from '@nestjs/common';
import { REQUEST } from '@nestjs/core';
import type { Request } from 'express';
import type { FieldChoice } from '../../lib/fields/types';
import type { OptionScalar } from '../../lib/html/option';
import { fromExpressRequest } from '../../lib/request/request-context';
import type { UserRecord } from '../../lib/users/types';
import { ContentFilterRegistry } from '../content-filters/content-filter.registry';
import { CONTENT_TAGS, type ContentKind } from '../content-filters/types';
import { FieldsService } from '../fields/fields.service';
import { WpdbService } from '../wpdb/wpdb.service';
import { ThemeBase } from './theme.base';

export interface UserQueryInput {
  readonly fields: ReadonlyArray<string>;
  readonly key: string;
  readonly compare: string;
  readonly value: string;
  readonly orderBy?: string;
  readonly order?: string;
}

/**
 * The theme object for one HTTP request. Works on a fork of the
 * application-wide content filters.
 */
@Injectable({ scope: Scope.REQUEST })
export class ThemeService extends ThemeBase {
  constructor(
    @Inject(REQUEST) req: Request,
    fields: FieldsService,
    wpdb: WpdbService,
    filters: ContentFilterRegistry,
  ) {
    super({
      fields,
      store: wpdb,
      request: fromExpressRequest(req),
      filters: filters.fork(),
    });
  }

  public fieldChoices(fieldId: string): Promise<ReadonlyArray<FieldChoice>> {
    return this.getSelectFieldChoices(fieldId);
  }

  /** Print one `<option>` per choice of `fieldId` and return the markup. */
  public async renderFieldOptions(
    fieldId: string,
    current: OptionScalar,
  ): Promise<string> {
    const choices = await this.getSelectFieldChoices(fieldId);
    for (const choice of choices) {
      this.printOption(choice.value, choice.label, current);
    }
    return this.flushOutput();
  }

  public queryUsers(input: UserQueryInput): Promise<UserRecord[] | null> {
    return this.getUserData(
      input.fields,
      input.key,
      input.compare,
      input.value,
      input.orderBy,
      input.order,
    );
  }

  /** Run content or an excerpt through its pipeline without sharing links. */
  public renderContent(kind: ContentKind, text: string): string {
    this.suppressSharingLinks();
    return this.deps.filters.applyFilters(CONTENT_TAGS[kind], text);
  }
}
