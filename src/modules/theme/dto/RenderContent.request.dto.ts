import { IsIn, IsString } from 'class-validator';
import type { ContentKind } from '../../content-filters/types';

const CONTENT_KINDS: ReadonlyArray<ContentKind> = ['content', 'excerpt'];

/** POST /api/theme/content */
export class RenderContentRequestDto {
  @IsIn(CONTENT_KINDS)
  readonly type!: ContentKind;

  @IsString()
  readonly text!: string;
}

export class RenderContentResponseDto {
  readonly text!: string;
}
