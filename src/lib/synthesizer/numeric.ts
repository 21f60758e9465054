/**
 * Numeric value helpers honouring declared precision and scale
 */

import type { Faker } from "@faker-js/faker";
import { isIntegerType, type DataType } from "../../types/schema-model.js";

export const DEFAULT_PRECISION = 5;
const MAX_WHOLE_DIGITS = 9;

function validNumber(value: number | undefined): value is number {
  return value !== undefined && Number.isInteger(value) && value >= 0;
}

function declaresPrecision(type: DataType): boolean {
  return validNumber(type.precision) && type.precision > 0;
}

/**
 * Declared scale; numeric(p) without one has scale 0
 */
export function effectiveScale(type: DataType): number | undefined {
  if (validNumber(type.scale)) return type.scale;
  return type.tag === "decimal" && declaresPrecision(type) ? 0 : undefined;
}

/**
 * Decimal whose whole part fits precision - scale digits, with a two-digit fraction.
 * Missing or malformed precision falls back to DEFAULT_PRECISION with scale 2; a scale of 0 yields a whole number.
 */
export function decimalForPrecision(random: Faker, type: DataType): string {
  const precision = validNumber(type.precision) && type.precision > 0 ? type.precision : DEFAULT_PRECISION;
  const scale = effectiveScale(type) ?? 2;

  const wholeDigits = Math.min(Math.max(precision - scale, 0), MAX_WHOLE_DIGITS);
  const max = 10 ** wholeDigits - 1;
  const whole = random.number.int({ min: 0, max });

  if (scale === 0) {
    return String(whole);
  }

  const fraction = random.number.int({ min: 0, max: 99 });
  return `${whole}.${String(fraction).padStart(2, "0")}`;
}

/**
 * Largest whole value the declared type can hold, when it is narrower than the generators assume
 */
export function wholeLimit(type: DataType): number | undefined {
  if (type.tag === "smallint") return 32767;
  if (type.tag !== "decimal" || !validNumber(type.precision) || type.precision === 0) return undefined;

  const scale = validNumber(type.scale) ? type.scale : 0;
  return 10 ** Math.min(Math.max(type.precision - scale, 0), MAX_WHOLE_DIGITS) - 1;
}

/**
 * A value with two decimals between min and max, or a whole number for integer columns.
 * The range is clamped to what the declared precision allows.
 */
export function amountBetween(random: Faker, type: DataType, min: number, max: number): string {
  const limit = wholeLimit(type);
  const upper = limit === undefined ? max : Math.min(max, limit);
  const lower = Math.min(min, upper);

  if (isIntegerType(type) || effectiveScale(type) === 0) {
    return String(random.number.int({ min: Math.ceil(lower), max: Math.floor(upper) }));
  }
  const cents = random.number.int({ min: Math.round(lower * 100), max: Math.round(upper * 100) });
  return (cents / 100).toFixed(2);
}

export function money(random: Faker, type: DataType): string {
  if (isIntegerType(type)) {
    return amountBetween(random, type, 10, 10000);
  }
  return amountBetween(random, type, 1, 10000);
}

/**
 * Whether a string is a plain decimal number that can be emitted unquoted
 */
export function isNumericString(value: string): boolean {
  return /^-?\d+(\.\d+)?$/.test(value.trim());
}
