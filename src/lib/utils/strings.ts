/** Narrow unknown input to a non-empty string. */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

/** Shorten a value for log lines and error previews. */
export function summarize(v: unknown): unknown {
  if (v == null) return v;
  if (typeof v === 'string') {
    return v.length > 120 ? `${v.slice(0, 117)}...` : v;
  }
  if (typeof v === 'number' || typeof v === 'boolean') return v;
  if (Array.isArray(v)) return `[array(${v.length})]`;
  if (typeof v === 'object') return '[object]';
  return `[${typeof v}]`;
}
