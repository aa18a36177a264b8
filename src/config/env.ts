/**
 * Environment readers used to derive the gateway defaults. Every reader trims
 * the raw value, treats blank strings as unset and falls back to the supplied
 * default when the literal cannot be coerced.
 */

/** Source of variables, injectable so tests do not have to mutate `process.env`. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

interface NumberBounds {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function readRaw(name: string, env: EnvSource): string | undefined {
  const raw = env[name];
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

function withinBounds(value: number, bounds: NumberBounds | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (bounds?.min !== undefined && value < bounds.min) {
    return false;
  }
  if (bounds?.max !== undefined && value > bounds.max) {
    return false;
  }
  return true;
}

/** Returns the base-10 integer stored in `name`, or `undefined` when unset or invalid. */
export function readOptionalInt(
  name: string,
  bounds?: NumberBounds,
  env: EnvSource = process.env,
): number | undefined {
  const normalised = readRaw(name, env);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, bounds) ? value : undefined;
}

export function readInt(
  name: string,
  defaultValue: number,
  bounds?: NumberBounds,
  env: EnvSource = process.env,
): number {
  return readOptionalInt(name, bounds, env) ?? defaultValue;
}

/** Returns the trimmed string stored in `name`, or `undefined` when blank. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return readRaw(name, env);
}

/** Reads an enum literal, matching the allow-list case-insensitively. */
export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: EnvSource = process.env,
): T {
  const normalised = readRaw(name, env)?.toLowerCase();
  if (normalised === undefined) {
    return defaultValue;
  }
  return allowed.find((value) => value.toLowerCase() === normalised) ?? defaultValue;
}
