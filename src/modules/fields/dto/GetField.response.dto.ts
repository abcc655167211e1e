import type { FieldDto } from './ListFields.response.dto';

export class GetFieldResponseDto {
  readonly field!: FieldDto | null;
}
