import { Type } from 'class-transformer';
import { IsInt, IsOptional, Min } from 'class-validator';

/** GET /api/theme/segments?index=... */
export class SegmentsRequestDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  readonly index?: number;
}

export type SegmentsResponseDto =
  | { readonly segments: ReadonlyArray<string> }
  | { readonly index: number; readonly segment: string | null };
