/**
 * Pattern inference on sampled column values
 */

import type { SimpleCategory } from "./semantic-types.js";
import { PRIORITY_LEVELS, SKILL_LEVELS, STATUS_VALUES, inVocabulary } from "./vocabularies.js";

export interface SamplePattern {
  name: string;
  category: SimpleCategory;
  test: (value: string) => boolean;
}

function isMacAddress(value: string): boolean {
  return value.length === 17 && value.split(":").length === 6;
}

function isIPv4(value: string): boolean {
  const parts = value.split(".");
  return (
    parts.length === 4 &&
    parts.every((part) => /^\d{1,3}$/.test(part) && Number(part) <= 255)
  );
}

function isEmailLike(value: string): boolean {
  return value.includes("@") && value.includes(".");
}

/**
 * Checked in order against the first sample
 */
export const SAMPLE_PATTERNS: readonly SamplePattern[] = [
  { name: "MacAddress", category: "mac-address", test: isMacAddress },
  { name: "IPv4", category: "ipv4", test: isIPv4 },
  { name: "Email", category: "email", test: isEmailLike },
  { name: "Status", category: "status", test: (v) => inVocabulary(STATUS_VALUES, v) },
  { name: "SkillLevel", category: "skill-level", test: (v) => inVocabulary(SKILL_LEVELS, v) },
  { name: "Priority", category: "priority", test: (v) => inVocabulary(PRIORITY_LEVELS, v) },
];

/**
 * Infer a category from sample values.
 * Returns "sampled" when samples exist but none of the patterns recognise the first one.
 */
export function inferFromSamples(samples: readonly string[] | undefined): SimpleCategory | null {
  const first = samples?.[0];
  if (first === undefined) {
    return null;
  }

  const pattern = SAMPLE_PATTERNS.find((p) => p.test(first));
  return pattern ? pattern.category : "sampled";
}
