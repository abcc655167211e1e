import { IsString, Matches } from 'class-validator';
import { FIELD_KEY_PATTERN } from './field-key.pattern';

export class DeleteFieldRequestDto {
  @IsString()
  @Matches(FIELD_KEY_PATTERN)
  readonly key!: string;
}

export class DeleteFieldResponseDto {
  readonly deleted!: boolean;
}
