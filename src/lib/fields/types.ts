import type { WithId } from 'mongodb';

/**
 * Collection name for custom field definitions.
 */
export const FIELDS_COLLECTION = 'fields' as const;

/**
 * Field keys follow the custom-fields plugin conventions: either generated ids
 * ("field_5a1b2c3d") or snake/kebab names ("favorite_color", "job-title").
 */
export function isFieldKey(value: string): boolean {
  return /^[a-z0-9_]+(?:-[a-z0-9_]+)*$/.test(value);
}

/** Field types that matter to theme helpers. Only the choice types carry options. */
export const FIELD_TYPES = Object.freeze([
  'text',
  'textarea',
  'number',
  'select',
  'checkbox',
  'radio',
  'true_false',
] as const);

export type FieldType = (typeof FIELD_TYPES)[number];

export function isFieldType(value: unknown): value is FieldType {
  return (
    typeof value === 'string' &&
    (FIELD_TYPES as ReadonlyArray<string>).includes(value)
  );
}

/**
 * One selectable choice. Choices are stored as an ordered list rather than an
 * object so numeric-looking values ("10", "2") keep their authored order.
 */
export interface FieldChoice {
  readonly value: string;
  readonly label: string;
}

/** What the theme layer needs from a field definition. */
export interface FieldDefinition {
  readonly key: string;
  readonly label: string;
  readonly type: FieldType;
  readonly choices?: ReadonlyArray<FieldChoice>;
}

/** Looks up a field definition by key; `null` when unknown. */
export interface FieldDefinitionProvider {
  getDefinition(key: string): Promise<FieldDefinition | null>;
}

/** Persisted shape (no _id). */
export interface FieldDocBase extends FieldDefinition {
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export type FieldDoc = WithId<FieldDocBase>;

export function isFieldChoice(value: unknown): value is FieldChoice {
  if (!value || typeof value !== 'object') return false;
  return (
    'value' in value &&
    typeof value.value === 'string' &&
    'label' in value &&
    typeof value.label === 'string'
  );
}

/** Choices must be unique by value. */
export function hasUniqueChoiceValues(
  choices: ReadonlyArray<FieldChoice>,
): boolean {
  return new Set(choices.map((c) => c.value)).size === choices.length;
}
