import type { HandlerEntry } from './types.js';

export function stringOption(entry: HandlerEntry, key: string, fallback: string): string {
  const value = entry[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string') {
    throw new Error(`Handler ${entry.name}: option "${key}" must be a string`);
  }
  return value;
}

export function stringListOption(entry: HandlerEntry, key: string): string[] {
  const value = entry[key];
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new Error(`Handler ${entry.name}: option "${key}" must be a list of strings`);
  }
  return value;
}
