import { IsOptional, IsString, Matches } from 'class-validator';
import { FIELD_KEY_PATTERN } from '../../fields/dto/field-key.pattern';

/** GET /api/theme/options?field=...&current=... */
export class FieldOptionsRequestDto {
  @IsString()
  @Matches(FIELD_KEY_PATTERN)
  readonly field!: string;

  @IsOptional()
  @IsString()
  readonly current?: string;
}

export class FieldOptionsResponseDto {
  /** Concatenated `<option>` elements. */
  readonly html!: string;
  /** False when the caller asked for a bare fragment (`ajax=true`). */
  readonly wrapper!: boolean;
}
