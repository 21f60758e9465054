/**
 * Free text, codes and fictional place names
 */

import type { Faker } from "@faker-js/faker";
import { tokenizeName } from "../classifier/column-name.js";

const FICTION_PREFIXES = [
  "Aether",
  "Crystal",
  "Dragon",
  "Ember",
  "Frost",
  "Iron",
  "Moon",
  "Shadow",
  "Silver",
  "Storm",
  "Sun",
  "Thorn",
] as const;

const FICTION_SUFFIXES = [
  "crest",
  "fall",
  "ford",
  "gate",
  "haven",
  "hold",
  "keep",
  "mere",
  "reach",
  "spire",
  "vale",
  "wood",
] as const;

function capitalize(value: string): string {
  return value.length === 0 ? value : value.charAt(0).toUpperCase() + value.slice(1);
}

export function title(random: Faker): string {
  return capitalize(random.lorem.words({ min: 3, max: 8 }));
}

export function description(random: Faker): string {
  return random.lorem.sentence({ min: 8, max: 20 });
}

export function longText(random: Faker): string {
  return random.lorem.sentences({ min: 2, max: 5 });
}

export function fictionPlace(random: Faker): string {
  return `${random.helpers.arrayElement(FICTION_PREFIXES)}${random.helpers.arrayElement(FICTION_SUFFIXES)}`;
}

/**
 * Three upper-case letters taken from the first name token long enough to provide them
 */
export function codePrefix(columnName: string): string | undefined {
  for (const token of tokenizeName(columnName).tokens) {
    const letters = token.replace(/[^a-z]/g, "");
    if (letters.length >= 3) {
      return letters.slice(0, 3).toUpperCase();
    }
  }
  return undefined;
}

/**
 * ABC-1234-567890
 */
export function code(random: Faker, columnName: string): string {
  const prefix = codePrefix(columnName) ?? random.string.alpha({ length: 3, casing: "upper" });
  const first = random.string.numeric({ length: 4, allowLeadingZeros: true });
  const second = random.string.numeric({ length: 6, allowLeadingZeros: true });
  return `${prefix}-${first}-${second}`;
}

/**
 * Cut a value to a declared character length
 */
export function fitLength(value: string, length: number | undefined): string {
  if (length === undefined || length <= 0 || value.length <= length) {
    return value;
  }
  return value.slice(0, length);
}
