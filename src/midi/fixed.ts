// ─── Fixed-Point Time ───────────────────────────────────────────────────────
//
// Sign-magnitude fixed-point numbers scaled by 2^32. Event times and scale
// factors use this instead of floats so that every transform produces
// bit-identical output for identical input.
//
// Usage:
//   const t = fixed(480);             // 480 ticks
//   const half = fixed(0.5);
//   toNumber(mul(t, half));           // → 240
// ─────────────────────────────────────────────────────────────────────────────

import { TransformError } from "../errors.js";

// ─── Representation ─────────────────────────────────────────────────────────

/** Number of fractional bits. */
export const FRACTION_BITS = 32n;

const SCALE = 1n << FRACTION_BITS;
const SCALE_NUMBER = 2 ** 32;

/**
 * A signed fixed-point value: `(negative ? -1 : 1) * magnitude / 2^32`.
 * Zero is always non-negative.
 */
export interface Fixed {
  readonly negative: boolean;
  readonly magnitude: bigint;
}

function make(negative: boolean, magnitude: bigint): Fixed {
  return { negative: magnitude === 0n ? false : negative, magnitude };
}

function toRaw(value: Fixed): bigint {
  return value.negative ? -value.magnitude : value.magnitude;
}

function fromRaw(raw: bigint): Fixed {
  return raw < 0n ? make(true, -raw) : make(false, raw);
}

/** Divide magnitudes, rounding half away from zero. */
function divRound(numerator: bigint, denominator: bigint): bigint {
  const quotient = numerator / denominator;
  const remainder = numerator % denominator;
  return remainder * 2n >= denominator ? quotient + 1n : quotient;
}

function floorDiv(a: bigint, b: bigint): bigint {
  const q = a / b;
  return a % b !== 0n && (a < 0n) !== (b < 0n) ? q - 1n : q;
}

export const ZERO: Fixed = make(false, 0n);
export const ONE: Fixed = make(false, SCALE);

// ─── Construction ───────────────────────────────────────────────────────────

/**
 * Build a fixed-point value from a JS number. Integers convert exactly;
 * fractions round to the nearest 2^-32, half away from zero.
 */
export function fixed(value: number): Fixed {
  if (!Number.isFinite(value)) {
    throw new TransformError("InvalidArgument", "fixed", `Not a finite number: ${value}`);
  }
  if (Number.isInteger(value)) {
    return fromRaw(BigInt(value) << FRACTION_BITS);
  }
  const scaled = Math.round(Math.abs(value) * SCALE_NUMBER);
  return make(value < 0, BigInt(scaled));
}

/** Exact-as-possible ratio of two integers (e.g. 1/3 of a beat). */
export function fromRatio(numerator: number, denominator: number): Fixed {
  if (!Number.isInteger(numerator) || !Number.isInteger(denominator) || denominator === 0) {
    throw new TransformError(
      "InvalidArgument",
      "fromRatio",
      `Expected integer numerator and non-zero integer denominator, got ${numerator}/${denominator}`,
    );
  }
  const num = BigInt(numerator);
  const den = BigInt(denominator);
  const magnitude = divRound((num < 0n ? -num : num) << FRACTION_BITS, den < 0n ? -den : den);
  return make((num < 0n) !== (den < 0n), magnitude);
}

/** Accept either a plain number or an existing Fixed. */
export function toFixed(value: number | Fixed): Fixed {
  return typeof value === "number" ? fixed(value) : value;
}

// ─── Arithmetic ─────────────────────────────────────────────────────────────

export function add(a: Fixed, b: Fixed): Fixed {
  return fromRaw(toRaw(a) + toRaw(b));
}

export function sub(a: Fixed, b: Fixed): Fixed {
  return fromRaw(toRaw(a) - toRaw(b));
}

/** Product, rounded half away from zero at the fixed resolution. */
export function mul(a: Fixed, b: Fixed): Fixed {
  return make(a.negative !== b.negative, divRound(a.magnitude * b.magnitude, SCALE));
}

/** `value * numerator / denominator` with a single rounding step. */
export function mulDiv(value: Fixed, numerator: number, denominator: number): Fixed {
  if (!Number.isInteger(numerator) || numerator < 0 || !Number.isInteger(denominator) || denominator <= 0) {
    throw new TransformError(
      "InvalidArgument",
      "mulDiv",
      `Expected non-negative integer numerator and positive integer denominator, got ${numerator}/${denominator}`,
    );
  }
  return make(value.negative, divRound(value.magnitude * BigInt(numerator), BigInt(denominator)));
}

export function divInt(value: Fixed, divisor: number): Fixed {
  return mulDiv(value, 1, divisor);
}

// ─── Comparison ─────────────────────────────────────────────────────────────

export function compare(a: Fixed, b: Fixed): -1 | 0 | 1 {
  const ra = toRaw(a);
  const rb = toRaw(b);
  if (ra < rb) return -1;
  if (ra > rb) return 1;
  return 0;
}

export function equals(a: Fixed, b: Fixed): boolean {
  return a.negative === b.negative && a.magnitude === b.magnitude;
}

export function isNegative(value: Fixed): boolean {
  return value.negative;
}

/** Largest of the given values, or undefined when there are none. */
export function maxOf(values: Iterable<Fixed>): Fixed | undefined {
  let best: Fixed | undefined;
  for (const v of values) {
    if (best === undefined || compare(v, best) > 0) best = v;
  }
  return best;
}

// ─── Rounding & Conversion ──────────────────────────────────────────────────

/**
 * Snap to the nearest multiple of an integer grid. An exact half rounds
 * toward the later grid line (for negative values too).
 */
export function roundToMultiple(value: Fixed, grid: number): Fixed {
  if (!Number.isInteger(grid) || grid <= 0) {
    throw new TransformError("InvalidArgument", "roundToMultiple", `grid must be a positive integer, got ${grid}`);
  }
  const unit = BigInt(grid) << FRACTION_BITS;
  const raw = toRaw(value);
  let q = floorDiv(raw, unit);
  const rem = raw - q * unit;
  if (rem * 2n >= unit) q += 1n;
  return fromRaw(q * unit);
}

/** Nearest whole tick (half up), as a JS number. */
export function toTicks(value: Fixed): number {
  return Number(toRaw(roundToMultiple(value, 1)) >> FRACTION_BITS);
}

/** Approximate float value. For display and interpolation only. */
export function toNumber(value: Fixed): number {
  const whole = Number(value.magnitude >> FRACTION_BITS);
  const frac = Number(value.magnitude & (SCALE - 1n)) / SCALE_NUMBER;
  const abs = whole + frac;
  return value.negative ? -abs : abs;
}

/** Stable string key, usable in Maps. */
export function fixedKey(value: Fixed): string {
  return toRaw(value).toString();
}
