/** Same rule as `isFieldKey`, for DTO validation. */
export const FIELD_KEY_PATTERN = /^[a-z0-9_]+(?:-[a-z0-9_]+)*$/;
