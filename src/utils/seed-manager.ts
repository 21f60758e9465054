import crypto from "crypto";
import { Faker, base, en } from "@faker-js/faker";
import { logger } from "./logger.js";

export function hashStringToSeed(seed: string): number {
  // Convert seed string to SHA-256 hash
  const hash = crypto.createHash("sha256").update(seed).digest("hex");

  // Convert first 8 characters of hash to numeric seed
  return parseInt(hash.slice(0, 8), 16);
}

export function generateRandomSeed(): string {
  return crypto.randomBytes(32).toString("hex");
}

export function toNumericSeed(seed: string | number): number {
  return typeof seed === "string" ? hashStringToSeed(seed) : seed;
}

export interface SeededRandom {
  random: Faker;
  seed: string | number;
}

/**
 * Create an isolated faker instance for one generation run.
 * Without a seed a fresh one is drawn and returned so the run can be replayed.
 */
export function createRandom(seed?: string | number): SeededRandom {
  const effectiveSeed = seed ?? generateRandomSeed();
  const random = new Faker({ locale: [en, base] });
  const numericSeed = toNumericSeed(effectiveSeed);
  random.seed(numericSeed);

  logger.debug("Random generator seeded", { seed: effectiveSeed, numericSeed });

  return { random, seed: effectiveSeed };
}
