/* Response DTOs for field definitions.
 * Explicit and serialization-friendly (no driver types).
 */

export interface FieldChoiceDto {
  readonly value: string;
  readonly label: string;
}

export class FieldDto {
  /** Mongo ObjectId as hex string */
  readonly id!: string;

  readonly key!: string;

  readonly label!: string;

  readonly type!: string;

  /** Present for select / checkbox / radio fields */
  readonly choices?: ReadonlyArray<FieldChoiceDto>;

  /** ISO-8601 timestamps */
  readonly createdAt!: string;
  readonly updatedAt!: string;
}

export class ListFieldsResponseDto {
  readonly fields!: ReadonlyArray<FieldDto>;
}
