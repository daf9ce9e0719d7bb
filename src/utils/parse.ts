/**
 * Narrowing helpers for untyped JSON: third-party API responses and
 * request bodies.
 */

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const readString = (source: Record<string, unknown>, key: string): string | undefined => {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
};

export const readNumber = (source: Record<string, unknown>, key: string): number | undefined => {
  const value = source[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
};

export const readRecord = (
  source: Record<string, unknown>,
  key: string
): Record<string, unknown> | undefined => {
  const value = source[key];
  return isRecord(value) ? value : undefined;
};

export const readBoolean = (source: Record<string, unknown>, key: string): boolean | undefined => {
  const value = source[key];
  return typeof value === 'boolean' ? value : undefined;
};
