/**
 * Closed vocabularies used both to recognise sampled values and to generate new ones
 */

export const STATUS_VALUES = [
  "active",
  "inactive",
  "pending",
  "suspended",
  "archived",
  "approved",
  "rejected",
  "draft",
  "published",
  "completed",
  "cancelled",
] as const;

export const SKILL_LEVELS = ["beginner", "novice", "intermediate", "advanced", "expert", "master"] as const;

export const PRIORITY_LEVELS = ["low", "medium", "high", "critical", "urgent"] as const;

export const CLASSIFICATION_LEVELS = ["public", "internal", "confidential", "restricted", "secret"] as const;

export const TIERS = ["free", "basic", "standard", "premium", "enterprise"] as const;

export const ROLES = ["admin", "editor", "viewer", "member", "owner", "guest"] as const;

export function inVocabulary(vocabulary: readonly string[], value: string): boolean {
  return vocabulary.includes(value.trim().toLowerCase());
}
