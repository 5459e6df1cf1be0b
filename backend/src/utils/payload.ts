import crypto from 'crypto';
import { JsonObject, JsonValue } from '../types';

/**
 * Helpers for reading platform JSON without trusting its shape
 */

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Re-validates an arbitrary value (typically JSON.parse output) as JSON */
export const toJsonValue = (value: unknown): JsonValue => {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }
  if (typeof value === 'object') {
    const result: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      if (item !== undefined) {
        result[key] = toJsonValue(item);
      }
    }
    return result;
  }
  return null;
};

export const getObject = (value: JsonValue | undefined): JsonObject | undefined =>
  isJsonObject(value) ? value : undefined;

export const getArray = (value: JsonValue | undefined): JsonValue[] =>
  Array.isArray(value) ? value : [];

export const getObjects = (value: JsonValue | undefined): JsonObject[] =>
  getArray(value).filter(isJsonObject);

/** Strings pass through, numbers are stringified; ids arrive as either */
export const getString = (value: JsonValue | undefined): string => {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
};

export const getNumber = (value: JsonValue | undefined): number | undefined => {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

/**
 * Platform timestamps come as epoch milliseconds, epoch seconds or ISO strings.
 * Values below 1e12 are read as seconds.
 */
export const parseTimestamp = (value: JsonValue | undefined): Date | undefined => {
  const numeric = getNumber(value);
  if (numeric !== undefined) {
    return new Date(numeric < 1e12 ? numeric * 1000 : numeric);
  }
  if (typeof value === 'string') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? undefined : parsed;
  }
  return undefined;
};

/** JSON with object keys sorted at every depth */
export const canonicalJson = (value: JsonValue): string => {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (isJsonObject(value)) {
    const keys = Object.keys(value).sort();
    return `{${keys.map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`).join(',')}}`;
  }
  return JSON.stringify(value);
};

export const contentHash = (value: JsonValue): string =>
  crypto.createHash('sha256').update(canonicalJson(value)).digest('hex');

export const truncate = (text: string, max = 500): string =>
  text.length > max ? `${text.slice(0, max)}...` : text;
