/** Scalar values an `<option>` can carry or be compared against. */
export type OptionScalar = string | number | boolean | null | undefined;

const NUMERIC_STRING = /^\s*[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?\s*$/;

function isNumericString(value: string): boolean {
  return NUMERIC_STRING.test(value);
}

function isTruthy(value: OptionScalar): boolean {
  if (typeof value === 'string') return value !== '' && value !== '0';
  return Boolean(value);
}

/**
 * Coercive equality used to decide which option is selected.
 *
 * - numbers and numeric strings compare by numeric value (`"1" == 1`, `"1.0" == "1"`)
 * - a number against a non-numeric string compares as strings
 * - booleans compare against the truthiness of the other side (`"0"` is falsy)
 * - `null` / `undefined` equal each other and the empty string
 */
export function looseEquals(a: OptionScalar, b: OptionScalar): boolean {
  if (a == null || b == null) {
    if (a == null && b == null) return true;
    const other = a == null ? b : a;
    if (typeof other === 'boolean') return other === false;
    return other === '';
  }

  if (typeof a === 'boolean' || typeof b === 'boolean') {
    return isTruthy(a) === isTruthy(b);
  }

  if (typeof a === 'number' && typeof b === 'number') return a === b;

  if (typeof a === 'string' && typeof b === 'string') {
    if (isNumericString(a) && isNumericString(b)) return Number(a) === Number(b);
    return a === b;
  }

  // one number, one string
  const str = typeof a === 'string' ? a : String(b);
  const num = typeof a === 'number' ? a : Number(b);
  if (isNumericString(str)) return Number(str) === num;
  return str === String(num);
}

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#039;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Markup for one `<option>`, marked selected when `value` loosely equals `current`.
 */
export function renderOption(
  value: OptionScalar,
  text: OptionScalar,
  current: OptionScalar,
): string {
  const selected = looseEquals(value, current) ? ' selected="selected"' : '';
  return `<option value="${escapeHtml(String(value ?? ''))}"${selected}>${escapeHtml(String(text ?? ''))}</option>`;
}
