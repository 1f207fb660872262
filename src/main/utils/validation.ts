type PlainObject = Record<string, unknown>;

export const MAX_CHUNK_SIZE = 1024 * 1024;

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function ensureString(
  value: unknown,
  field: string,
  options?: { enum?: ReadonlySet<string> }
): string {
  if (typeof value !== 'string') {
    throw new Error(`Field "${field}" must be a string.`);
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new Error(`Field "${field}" cannot be empty.`);
  }
  if (options?.enum && !options.enum.has(trimmed)) {
    throw new Error(`Field "${field}" must be one of: ${Array.from(options.enum).join(', ')}`);
  }
  return trimmed;
}

export function ensureBoolean(value: unknown, field: string): boolean {
  if (typeof value !== 'boolean') {
    throw new Error(`Field "${field}" must be a boolean.`);
  }
  return value;
}

export function ensureNumber(
  value: unknown,
  field: string,
  options?: { min?: number; max?: number; integer?: boolean }
): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new Error(`Field "${field}" must be a number.`);
  }
  if (options?.integer && !Number.isInteger(value)) {
    throw new Error(`Field "${field}" must be an integer.`);
  }
  if (options?.min !== undefined && value < options.min) {
    throw new Error(`Field "${field}" must be >= ${options.min}.`);
  }
  if (options?.max !== undefined && value > options.max) {
    throw new Error(`Field "${field}" must be <= ${options.max}.`);
  }
  return value;
}

/** Parses a decimal command-line value; rejects anything but plain digits. */
export function parseInteger(
  raw: string,
  field: string,
  options?: { min?: number; max?: number }
): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new Error(`Field "${field}" must be an integer.`);
  }
  return ensureNumber(Number(raw.trim()), field, { ...options, integer: true });
}

export function ensurePort(value: unknown, field = 'port'): number {
  return ensureNumber(value, field, { min: 1, max: 65535, integer: true });
}

export function ensureChunkSize(value: unknown, field = 'chunkSize'): number {
  return ensureNumber(value, field, { min: 1, max: MAX_CHUNK_SIZE, integer: true });
}
