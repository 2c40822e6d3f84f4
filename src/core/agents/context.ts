/**
 * Defensive readers for the weakly-typed context property map.
 *
 * A value of unexpected shape yields the empty container (or the given
 * fallback) instead of throwing.
 */

import type { ContextProperties, ContextValue } from '../../types/index.js';

type ContextRecord = { [key: string]: ContextValue };

function isRecord(value: ContextValue | undefined): value is ContextRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Read a string. Numbers and booleans are stringified.
 */
export function readString(
  properties: ContextProperties,
  key: string,
  fallback: string = ''
): string {
  const value = properties[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return fallback;
}

export function readNumber(
  properties: ContextProperties,
  key: string,
  fallback: number = 0
): number {
  const value = properties[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

export function readBoolean(
  properties: ContextProperties,
  key: string,
  fallback: boolean = false
): boolean {
  const value = properties[key];
  return typeof value === 'boolean' ? value : fallback;
}

/**
 * Read a list of strings. A single string becomes a one-item list;
 * non-string items are skipped; anything else yields [].
 */
export function readStringList(properties: ContextProperties, key: string): string[] {
  const value = properties[key];
  if (typeof value === 'string') {
    return value.trim() ? [value] : [];
  }
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Read a nested map; anything that is not a plain map yields {}.
 */
export function readRecord(properties: ContextProperties, key: string): ContextRecord {
  const value = properties[key];
  return isRecord(value) ? value : {};
}
