/**
 * Column and table name normalisation shared by the classifier rules and the row context
 */

export interface NormalizedName {
  /** snake_case, lower-cased form, e.g. "firstName" -> "first_name" */
  normalized: string;
  tokens: readonly string[];
}

export function normalizeName(name: string): string {
  return name
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/[\s\-.]+/g, "_")
    .toLowerCase();
}

export function tokenizeName(name: string): NormalizedName {
  const normalized = normalizeName(name);
  return {
    normalized,
    tokens: normalized.split("_").filter((token) => token.length > 0),
  };
}

/**
 * Naive English singular form, enough for table-name conventions (users -> user, companies -> company)
 */
export function singularize(word: string): string {
  if (word.endsWith("ies") && word.length > 3) return `${word.slice(0, -3)}y`;
  if (/(ss|us)$/.test(word)) return word;
  if (/(s|x|z|ch|sh)es$/.test(word)) return word.slice(0, -2);
  if (word.endsWith("s") && word.length > 1) return word.slice(0, -1);
  return word;
}
