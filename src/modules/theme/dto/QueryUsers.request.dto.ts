import {
  ArrayMaxSize,
  IsArray,
  IsOptional,
  IsString,
  Matches,
} from 'class-validator';
import type { UserRecord } from '../../../lib/users/types';

/** Column and meta-key names; no dots, since a dot qualifies an identifier. */
const ATTRIBUTE_NAME = /^[A-Za-z0-9_-]+$/;

/**
 * POST /api/theme/users/query
 * `compare` is not restricted here: the query builder rejects
 * unknown operators itself.
 */
export class QueryUsersRequestDto {
  @IsArray()
  @ArrayMaxSize(32)
  @IsString({ each: true })
  @Matches(ATTRIBUTE_NAME, { each: true })
  readonly fields!: string[];

  @IsString()
  @Matches(ATTRIBUTE_NAME)
  readonly key!: string;

  @IsString()
  readonly compare!: string;

  @IsString()
  readonly value!: string;

  @IsOptional()
  @IsString()
  @Matches(ATTRIBUTE_NAME)
  readonly orderBy?: string;

  @IsOptional()
  @IsString()
  readonly order?: string;
}

export class QueryUsersResponseDto {
  readonly users!: ReadonlyArray<UserRecord>;
}
