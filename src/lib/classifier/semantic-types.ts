/**
 * Closed set of semantic categories a column can be classified into
 */

export const SEMANTIC_CATEGORIES = [
  // identity
  "primary-key",
  "foreign-key",
  "uuid",
  // personal
  "first-name",
  "last-name",
  "full-name",
  "username",
  "gender",
  "birth-date",
  "job-title",
  // organizational
  "company-name",
  "department",
  // geographic
  "street-address",
  "city",
  "state",
  "country",
  "country-code",
  "postal-code",
  "latitude",
  "longitude",
  "timezone",
  // contact
  "email",
  "phone",
  // web / network
  "mac-address",
  "ipv4",
  "ipv6",
  "port",
  "url",
  "domain",
  "hostname",
  "user-agent",
  // temporal
  "start-date",
  "end-date",
  "updated-date",
  "timestamp",
  "year",
  // financial
  "money",
  "currency-code",
  "credit-card",
  "iban",
  "account-number",
  // cryptographic-looking
  "hash",
  "token",
  // status / classification
  "status",
  "priority",
  "skill-level",
  "classification",
  "tier",
  "role",
  "category",
  // code / identifier
  "code",
  // domain fiction
  "fiction-place",
  // content
  "title",
  "description",
  "long-text",
  "product-name",
  "label",
  "color",
  "tags",
  // file / path
  "mime-type",
  "file-path",
  "file-name",
  // measurement
  "percentage",
  "rating",
  "age",
  "quantity",
  "capacity",
  "measurement",
  // version
  "version",
  // sampled values with no recognisable pattern
  "sampled",
  // declared-type fallbacks
  "boolean",
  "integer",
  "decimal",
  "json",
  "array",
  "text",
  "unknown",
] as const;

export type SemanticCategory = (typeof SEMANTIC_CATEGORIES)[number];

export type SimpleCategory = Exclude<SemanticCategory, "foreign-key">;

export type SemanticType =
  | { category: "foreign-key"; referencedTable: string; referencedColumn: string }
  | { category: SimpleCategory };

/**
 * Generation priority; higher runs earlier within a row.
 * Derived fields (username, domain, email) sit below the data they are built from.
 */
const PRIORITIES: Partial<Record<SemanticCategory, number>> = {
  "primary-key": 100,
  "first-name": 90,
  "last-name": 90,
  "full-name": 85,
  "company-name": 80,
  "start-date": 75,
  username: 60,
  domain: 55,
  email: 50,
};

export const DEFAULT_PRIORITY = 0;

export function generationPriority(category: SemanticCategory): number {
  return PRIORITIES[category] ?? DEFAULT_PRIORITY;
}

/**
 * Kind of value a category produces; decides which declared types can hold it
 */
export type ValueKind =
  | "text"
  | "integer"
  | "numeric"
  | "temporal"
  | "boolean"
  | "network"
  | "mac"
  | "json"
  | "array"
  | "any";

export const CATEGORY_VALUE_KINDS: Record<SemanticCategory, ValueKind> = {
  "primary-key": "any",
  "foreign-key": "any",
  uuid: "text",
  "first-name": "text",
  "last-name": "text",
  "full-name": "text",
  username: "text",
  gender: "text",
  "birth-date": "temporal",
  "job-title": "text",
  "company-name": "text",
  department: "text",
  "street-address": "text",
  city: "text",
  state: "text",
  country: "text",
  "country-code": "text",
  "postal-code": "text",
  latitude: "numeric",
  longitude: "numeric",
  timezone: "text",
  email: "text",
  phone: "text",
  "mac-address": "mac",
  ipv4: "network",
  ipv6: "network",
  port: "integer",
  url: "text",
  domain: "text",
  hostname: "text",
  "user-agent": "text",
  "start-date": "temporal",
  "end-date": "temporal",
  "updated-date": "temporal",
  timestamp: "temporal",
  year: "integer",
  money: "numeric",
  "currency-code": "text",
  "credit-card": "text",
  iban: "text",
  "account-number": "text",
  hash: "text",
  token: "text",
  status: "text",
  priority: "text",
  "skill-level": "text",
  classification: "text",
  tier: "text",
  role: "text",
  category: "text",
  code: "text",
  "fiction-place": "text",
  title: "text",
  description: "text",
  "long-text": "text",
  "product-name": "text",
  label: "text",
  color: "text",
  tags: "array",
  "mime-type": "text",
  "file-path": "text",
  "file-name": "text",
  percentage: "numeric",
  rating: "integer",
  age: "integer",
  quantity: "integer",
  capacity: "integer",
  measurement: "numeric",
  version: "text",
  sampled: "any",
  boolean: "boolean",
  integer: "integer",
  decimal: "numeric",
  json: "json",
  array: "array",
  text: "text",
  unknown: "any",
};

/**
 * Categories whose context value is remembered under a well-known key for later columns
 */
export const CONTEXT_ROLE_KEYS: Partial<Record<SemanticCategory, string>> = {
  "first-name": "first_name",
  "last-name": "last_name",
  "full-name": "full_name",
  username: "username",
  "company-name": "company_name",
  domain: "domain_name",
};
