import type { ContextValue } from '../../types/index.js';

/**
 * Commander collector for a repeatable option
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Turn `key=value` pairs into context properties. "true"/"false" become
 * booleans and numeric text becomes a number; a key given more than once
 * becomes a list.
 *
 * @throws Error on a pair without "=" or with an empty key
 */
export function parseProperties(pairs: string[]): Record<string, ContextValue> {
  const properties: Record<string, ContextValue> = {};

  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    const key = separator > 0 ? pair.slice(0, separator).trim() : '';
    if (!key) {
      throw new Error(`Invalid property '${pair}': expected key=value`);
    }

    const value = coerce(pair.slice(separator + 1).trim());
    const existing = properties[key];
    if (existing === undefined) {
      properties[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      properties[key] = [existing, value];
    }
  }

  return properties;
}

/**
 * Split a comma-separated option value, dropping blanks
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function coerce(raw: string): ContextValue {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (raw !== '' && /^-?\d+(\.\d+)?$/.test(raw)) return Number(raw);
  return raw;
}
