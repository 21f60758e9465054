/**
 * Date generation relative to a reference "now", formatted for the column's declared type
 */

import type { Faker } from "@faker-js/faker";
import type { DataType } from "../../types/schema-model.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const SECONDS_PER_DAY = 24 * 60 * 60;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

export function formatDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

export function formatTime(date: Date): string {
  return `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

export function formatTimestamp(date: Date): string {
  return `${formatDate(date)} ${formatTime(date)}`;
}

export function formatForType(date: Date, type: DataType): string {
  switch (type.tag) {
    case "date":
      return formatDate(date);
    case "time":
      return formatTime(date);
    default:
      return formatTimestamp(date);
  }
}

/**
 * Parse a "YYYY-MM-DD[ HH:MM:SS]" value (as produced here or sampled) as UTC
 */
export function parseTimestamp(value: string): Date | undefined {
  const match = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?/.exec(value.trim());
  if (!match) return undefined;

  const [, year, month, day, hours = "0", minutes = "0", seconds = "0"] = match;
  const date = new Date(
    Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hours), Number(minutes), Number(seconds)),
  );
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * A moment between minDays and maxDays before now, at a random time of day
 */
export function daysBefore(random: Faker, now: Date, minDays: number, maxDays: number): Date {
  const days = random.number.int({ min: minDays, max: maxDays });
  const seconds = random.number.int({ min: 0, max: SECONDS_PER_DAY - 1 });
  return new Date(now.getTime() - days * DAY_MS - seconds * 1000);
}

/**
 * A moment between minDays and maxDays after a base date, at the same time of day
 */
export function daysAfter(random: Faker, base: Date, minDays: number, maxDays: number): Date {
  const days = random.number.int({ min: minDays, max: maxDays });
  return new Date(base.getTime() + days * DAY_MS);
}

/** Creation, establishment and other start-like dates: one to five years ago */
export function startDate(random: Faker, now: Date): Date {
  return daysBefore(random, now, 365, 5 * 365);
}

/** End dates land 30 to 730 days after the row's start date, or after a recent date when there is none */
export function endDate(random: Faker, now: Date, start: Date | undefined): Date {
  const base = start ?? daysBefore(random, now, 0, 90);
  return daysAfter(random, base, 30, 730);
}

export function updateDate(random: Faker, now: Date): Date {
  return daysBefore(random, now, 1, 90);
}

export function recentDate(random: Faker, now: Date): Date {
  return daysBefore(random, now, 0, 730);
}

export function birthDate(random: Faker, now: Date): Date {
  return daysBefore(random, now, 18 * 365, 80 * 365);
}
