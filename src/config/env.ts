/**
 * Shared helpers dedicated to reading environment variables in a predictable
 * manner. Every reader treats blank values as "unset" and falls back to the
 * supplied default when the literal cannot be coerced.
 */

/** Normalises the raw value retrieved from {@link process.env}. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

export interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

/** Determines whether the provided value fits the numeric constraints. */
export function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/**
 * Reads the environment variable as a base-10 integer. Unexpected values cause
 * the helper to return the provided default.
 */
export function readInt(name: string, defaultValue: number, options?: NumberOptions): number {
  return readOptionalInt(name, options) ?? defaultValue;
}

/** Returns an optional integer when {@link name} contains a valid base-10 literal. */
export function readOptionalInt(name: string, options?: NumberOptions): number | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return undefined;
  }

  if (!/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }

  const value = Number.parseInt(normalised, 10);
  // Literals beyond Number.MAX_SAFE_INTEGER would be silently rounded.
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }

  return withinBounds(value, options) ? value : undefined;
}

/** Reads a textual environment variable while trimming surrounding whitespace. */
export function readString(name: string, defaultValue: string): string {
  return readOptionalString(name) ?? defaultValue;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(name: string): string | undefined {
  return normaliseEnvValue(process.env[name]);
}

/**
 * Reads an enum-like environment variable while validating that the literal
 * belongs to the supplied allow-list. Comparison is case-insensitive.
 */
export function readOptionalEnum<T extends string>(name: string, allowed: readonly T[]): T | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return undefined;
  }

  const lookup = new Map<string, T>();
  for (const value of allowed) {
    lookup.set(value.toLowerCase(), value);
  }
  return lookup.get(normalised.toLowerCase());
}

/** Returns a canonical enum value, defaulting to {@link defaultValue} when unset or invalid. */
export function readEnum<T extends string>(name: string, allowed: readonly T[], defaultValue: T): T {
  return readOptionalEnum(name, allowed) ?? defaultValue;
}
