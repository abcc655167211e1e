import { IsString, Matches } from 'class-validator';
import { FIELD_KEY_PATTERN } from './field-key.pattern';

/** GET /api/fields/get?key=... */
export class GetFieldRequestDto {
  @IsString()
  @Matches(FIELD_KEY_PATTERN)
  readonly key!: string;
}
