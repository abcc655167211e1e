import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsOptional,
  IsString,
  Matches,
  ValidateNested,
} from 'class-validator';
import { FIELD_TYPES } from '../../../lib/fields/types';
import { FIELD_KEY_PATTERN } from './field-key.pattern';
import type { FieldDto } from './ListFields.response.dto';

export class FieldChoiceRequestDto {
  @IsString()
  readonly value!: string;

  @IsString()
  readonly label!: string;
}

/**
 * POST /api/fields/save — creates the field or replaces the stored one.
 * Choice/type compatibility is checked by the service.
 */
export class SaveFieldRequestDto {
  @IsString()
  @Matches(FIELD_KEY_PATTERN)
  readonly key!: string;

  @IsString()
  readonly label!: string;

  @IsIn(FIELD_TYPES)
  readonly type!: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => FieldChoiceRequestDto)
  readonly choices?: FieldChoiceRequestDto[];
}

export class SaveFieldResponseDto {
  readonly field!: FieldDto;
}
