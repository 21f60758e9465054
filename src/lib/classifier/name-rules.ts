/**
 * Ordered keyword rules mapping column names to semantic categories.
 * Evaluated top to bottom; the first matching rule whose category the declared type can hold wins.
 */

import type { SimpleCategory } from "./semantic-types.js";
import { singularize, type NormalizedName } from "./column-name.js";

export type RuleGroup =
  | "identity"
  | "personal"
  | "organizational"
  | "geographic"
  | "contact"
  | "network"
  | "temporal"
  | "financial"
  | "cryptographic"
  | "classification"
  | "identifier"
  | "fiction"
  | "content"
  | "file"
  | "measurement"
  | "version";

export interface RuleInput {
  column: NormalizedName;
  table: NormalizedName;
}

export interface NameRule {
  id: string;
  group: RuleGroup;
  category: SimpleCategory;
  /** Stop the chain on a match even when the declared type cannot hold the category */
  terminal?: boolean;
  matches(input: RuleInput): boolean;
}

interface KeywordSpec {
  exact?: readonly string[];
  tokens?: readonly string[];
  contains?: readonly string[];
  suffixes?: readonly string[];
  unlessTokens?: readonly string[];
  unlessContains?: readonly string[];
  /** Extra condition, typically on the owning table */
  when?: (input: RuleInput) => boolean;
  terminal?: boolean;
}

export function keywordRule(
  id: string,
  group: RuleGroup,
  category: SimpleCategory,
  spec: KeywordSpec,
): NameRule {
  return {
    id,
    group,
    category,
    terminal: spec.terminal ?? false,
    matches(input) {
      const { normalized, tokens } = input.column;

      const hit =
        (spec.exact?.includes(normalized) ?? false) ||
        (spec.tokens?.some((t) => tokens.includes(t)) ?? false) ||
        (spec.contains?.some((c) => normalized.includes(c)) ?? false) ||
        (spec.suffixes?.some((s) => normalized.endsWith(s)) ?? false);
      if (!hit) return false;

      if (spec.unlessTokens?.some((t) => tokens.includes(t))) return false;
      if (spec.unlessContains?.some((c) => normalized.includes(c))) return false;

      return spec.when ? spec.when(input) : true;
    },
  };
}

function tableIsOneOf(words: readonly string[]): (input: RuleInput) => boolean {
  return (input) => input.table.tokens.some((token) => words.includes(singularize(token)));
}

const ORGANIZATION_TABLES = [
  "company",
  "organization",
  "organisation",
  "org",
  "vendor",
  "supplier",
  "brand",
  "business",
  "firm",
  "agency",
  "employer",
  "publisher",
  "manufacturer",
  "tenant",
];
const PRODUCT_TABLES = ["product", "item", "good", "merchandise"];
const FICTION_WORDS = [
  "sector",
  "outpost",
  "planet",
  "station",
  "colony",
  "galaxy",
  "starbase",
  "nebula",
  "quadrant",
  "realm",
  "moon",
];
const PERSON_QUALIFIERS = [
  "full",
  "display",
  "contact",
  "customer",
  "client",
  "author",
  "owner",
  "person",
  "employee",
  "manager",
  "member",
  "patient",
  "student",
  "teacher",
  "driver",
  "guest",
  "recipient",
  "sender",
  "buyer",
  "seller",
  "passenger",
  "player",
  "holder",
  "applicant",
];

/**
 * The rule chain. Order is precedence.
 */
export const NAME_RULES: readonly NameRule[] = [
  // identity / personal
  keywordRule("uuid", "identity", "uuid", { tokens: ["uuid", "guid"] }),
  // undeclared references and external identifiers
  keywordRule("identifier-suffix", "identity", "code", { suffixes: ["_id"], terminal: true }),
  keywordRule("first-name", "personal", "first-name", {
    exact: ["first_name", "firstname", "given_name", "fname", "forename"],
  }),
  keywordRule("last-name", "personal", "last-name", {
    exact: ["last_name", "lastname", "surname", "family_name", "lname"],
  }),
  keywordRule("username", "personal", "username", {
    exact: ["username", "user_name", "login", "user_login", "screen_name", "handle"],
    tokens: ["username", "nickname", "login", "handle"],
    unlessTokens: ["ip", "at", "date", "time", "count", "attempts", "url", "last", "file", "email", "failed"],
  }),
  keywordRule("actor", "personal", "full-name", {
    exact: [
      "created_by",
      "updated_by",
      "modified_by",
      "deleted_by",
      "approved_by",
      "reviewed_by",
      "author",
      "assignee",
      "reporter",
    ],
  }),
  keywordRule("person-name", "personal", "full-name", {
    exact: ["full_name", "fullname", "display_name"],
  }),
  keywordRule("table-named-name", "personal", "full-name", {
    tokens: ["name"],
    when: (input) => input.column.tokens.some((t) => PERSON_QUALIFIERS.includes(t)),
    unlessTokens: ["user", "file", "domain", "host", "company", "product"],
  }),
  keywordRule("gender", "personal", "gender", { tokens: ["gender", "sex"] }),
  keywordRule("birth-date", "personal", "birth-date", {
    tokens: ["dob", "birthday", "birthdate"],
    contains: ["birth"],
  }),
  keywordRule("job-title", "personal", "job-title", {
    exact: ["job_title", "jobtitle", "position", "designation"],
    tokens: ["occupation", "profession"],
  }),

  // organizational
  keywordRule("organization-name-column", "organizational", "company-name", {
    exact: ["name", "display_name", "legal_name", "trading_name"],
    when: tableIsOneOf(ORGANIZATION_TABLES),
  }),
  keywordRule("company-name", "organizational", "company-name", {
    tokens: ["company", "organization", "organisation", "employer", "vendor", "supplier", "firm", "brand", "publisher", "manufacturer", "agency"],
    unlessTokens: ["id", "email", "url", "website", "domain", "address", "phone", "size", "type", "count", "logo"],
  }),
  keywordRule("department", "organizational", "department", {
    tokens: ["department", "dept", "division", "team"],
    unlessTokens: ["id", "count", "size"],
  }),

  // geographic
  keywordRule("street-address", "geographic", "street-address", {
    tokens: ["address", "street", "addr", "shipping", "billing"],
    contains: ["address_line"],
    unlessTokens: ["mac", "ip", "email", "ipv4", "ipv6", "hardware", "remote", "web", "method", "cost", "fee"],
  }),
  keywordRule("city-name-column", "geographic", "city", {
    exact: ["name"],
    when: tableIsOneOf(["city", "town"]),
  }),
  keywordRule("city", "geographic", "city", { tokens: ["city", "town", "municipality"] }),
  keywordRule("state", "geographic", "state", {
    exact: ["state", "state_name", "province"],
    tokens: ["province", "region", "county"],
  }),
  keywordRule("country-code", "geographic", "country-code", {
    exact: ["country_code", "country_iso", "iso_country", "iso_code"],
  }),
  keywordRule("country-name-column", "geographic", "country", {
    exact: ["name"],
    when: tableIsOneOf(["country", "nation"]),
  }),
  keywordRule("country", "geographic", "country", { tokens: ["country", "nation", "nationality"] }),
  keywordRule("postal-code", "geographic", "postal-code", {
    tokens: ["zip", "zipcode", "postal", "postcode"],
  }),
  keywordRule("latitude", "geographic", "latitude", { tokens: ["lat", "latitude"] }),
  keywordRule("longitude", "geographic", "longitude", {
    exact: ["long", "lng", "lon"],
    tokens: ["longitude", "lng"],
  }),
  keywordRule("timezone", "geographic", "timezone", {
    tokens: ["timezone", "tz"],
    contains: ["time_zone"],
  }),

  // contact
  keywordRule("email", "contact", "email", {
    tokens: ["email", "mail"],
    contains: ["email"],
    unlessTokens: ["count", "verified", "sent", "opt", "enabled"],
  }),
  keywordRule("phone", "contact", "phone", {
    tokens: ["phone", "mobile", "cell", "telephone", "fax", "tel"],
    contains: ["phone"],
  }),

  // web / network
  keywordRule("mac-address", "network", "mac-address", {
    tokens: ["mac", "macaddr", "hwaddr"],
    contains: ["mac_address", "hardware_address"],
  }),
  keywordRule("ipv6", "network", "ipv6", { tokens: ["ipv6"] }),
  keywordRule("ipv4", "network", "ipv4", {
    tokens: ["ip", "ipv4", "ipaddress"],
    contains: ["ip_address", "ip_addr"],
    exact: ["remote_addr"],
  }),
  keywordRule("port", "network", "port", { tokens: ["port"] }),
  keywordRule("url", "network", "url", {
    tokens: ["url", "uri", "website", "homepage", "link", "href", "endpoint", "webhook"],
  }),
  keywordRule("domain", "network", "domain", {
    tokens: ["domain", "fqdn"],
    unlessTokens: ["email"],
  }),
  keywordRule("hostname", "network", "hostname", {
    tokens: ["hostname", "host", "server"],
    unlessTokens: ["port", "ip", "count", "id"],
  }),
  keywordRule("user-agent", "network", "user-agent", {
    tokens: ["useragent"],
    contains: ["user_agent"],
  }),

  // temporal
  keywordRule("start-date", "temporal", "start-date", {
    tokens: [
      "signed",
      "created",
      "established",
      "start",
      "started",
      "launched",
      "founded",
      "joined",
      "registered",
      "hired",
      "opened",
      "issued",
      "begin",
      "began",
      "commenced",
    ],
  }),
  keywordRule("end-date", "temporal", "end-date", {
    tokens: [
      "end",
      "ended",
      "ends",
      "expires",
      "expiry",
      "expiration",
      "expired",
      "closed",
      "finished",
      "completed",
      "terminated",
      "deadline",
      "due",
      "until",
    ],
  }),
  keywordRule("updated-date", "temporal", "updated-date", {
    tokens: ["updated", "modified", "changed", "edited", "synced", "refreshed"],
    contains: ["last_login", "last_seen"],
  }),
  keywordRule("timestamp", "temporal", "timestamp", {
    tokens: ["date", "timestamp", "datetime", "time"],
    suffixes: ["_at", "_on"],
  }),
  keywordRule("year", "temporal", "year", { tokens: ["year", "yr"] }),

  // financial
  keywordRule("money", "financial", "money", {
    tokens: [
      "price",
      "amount",
      "cost",
      "total",
      "subtotal",
      "balance",
      "salary",
      "fee",
      "revenue",
      "income",
      "budget",
      "wage",
      "payment",
      "tax",
      "discount",
      "refund",
      "charge",
    ],
    unlessTokens: ["id", "code", "number", "type", "rate", "status", "method", "items", "count", "qty", "quantity", "currency"],
  }),
  keywordRule("currency-code", "financial", "currency-code", { tokens: ["currency"] }),
  keywordRule("credit-card", "financial", "credit-card", {
    contains: ["credit_card", "card_number", "cc_number"],
  }),
  keywordRule("iban", "financial", "iban", { tokens: ["iban"] }),
  keywordRule("account-number", "financial", "account-number", {
    contains: ["account_number", "account_no", "routing_number", "bank_account"],
  }),

  // cryptographic-looking
  keywordRule("hash", "cryptographic", "hash", {
    tokens: ["hash", "checksum", "digest", "sha", "sha256", "md5", "fingerprint", "signature", "password", "passwd"],
  }),
  keywordRule("token", "cryptographic", "token", {
    tokens: ["token", "secret", "apikey", "nonce", "salt"],
    contains: ["api_key"],
  }),

  // status / classification
  keywordRule("status", "classification", "status", {
    tokens: ["status", "state"],
    unlessTokens: ["code"],
  }),
  keywordRule("priority", "classification", "priority", { tokens: ["priority", "urgency", "severity"] }),
  keywordRule("skill-level", "classification", "skill-level", {
    tokens: ["skill", "proficiency", "expertise"],
    contains: ["experience_level", "skill_level"],
  }),
  keywordRule("classification", "classification", "classification", {
    tokens: ["classification", "clearance", "sensitivity", "confidentiality"],
  }),
  keywordRule("tier", "classification", "tier", { tokens: ["tier", "plan", "subscription"] }),
  keywordRule("role", "classification", "role", { tokens: ["role"] }),
  keywordRule("category", "classification", "category", {
    tokens: ["category", "genre", "segment", "kind", "type"],
    unlessTokens: ["mime", "content", "media", "file"],
  }),

  // code / identifier
  keywordRule("code", "identifier", "code", {
    tokens: [
      "sku",
      "tracking",
      "serial",
      "badge",
      "reference",
      "ref",
      "barcode",
      "confirmation",
      "voucher",
      "coupon",
      "code",
    ],
    suffixes: ["_id", "_no", "_number", "_num"],
  }),

  // domain fiction
  keywordRule("fiction-name-column", "fiction", "fiction-place", {
    exact: ["name"],
    when: tableIsOneOf(FICTION_WORDS),
  }),
  keywordRule("fiction-place", "fiction", "fiction-place", { tokens: FICTION_WORDS }),

  // content
  keywordRule("product-name-column", "content", "product-name", {
    exact: ["name", "title"],
    when: tableIsOneOf(PRODUCT_TABLES),
  }),
  keywordRule("product-name", "content", "product-name", {
    exact: ["product", "product_name", "item_name"],
  }),
  keywordRule("title", "content", "title", {
    tokens: ["title", "headline", "subject", "caption", "heading"],
  }),
  keywordRule("description", "content", "description", {
    tokens: ["description", "desc", "summary", "bio", "about", "excerpt", "abstract", "details", "overview"],
  }),
  keywordRule("long-text", "content", "long-text", {
    tokens: [
      "body",
      "comment",
      "comments",
      "content",
      "notes",
      "note",
      "message",
      "text",
      "review",
      "feedback",
      "remarks",
      "instructions",
    ],
    unlessTokens: ["type", "length", "hash", "url", "count"],
  }),
  keywordRule("color", "content", "color", { tokens: ["color", "colour"] }),
  keywordRule("tags", "content", "tags", { tokens: ["tags", "keywords", "labels"] }),

  // file / path
  keywordRule("mime-type", "file", "mime-type", {
    tokens: ["mime", "mimetype"],
    contains: ["content_type", "media_type"],
  }),
  keywordRule("file-path", "file", "file-path", {
    tokens: ["path", "filepath", "directory", "dir", "folder"],
  }),
  keywordRule("file-name", "file", "file-name", {
    tokens: ["filename", "file", "attachment"],
    contains: ["file_name"],
  }),

  // measurement
  keywordRule("percentage", "measurement", "percentage", {
    tokens: ["percent", "percentage", "pct", "ratio", "rate"],
  }),
  keywordRule("rating", "measurement", "rating", { tokens: ["rating", "stars"] }),
  keywordRule("age", "measurement", "age", { tokens: ["age"] }),
  keywordRule("capacity", "measurement", "capacity", {
    tokens: ["capacity", "population", "seats", "headcount"],
  }),
  keywordRule("quantity", "measurement", "quantity", {
    tokens: ["quantity", "qty", "count", "stock", "inventory", "units", "num", "score", "points", "views", "likes", "visits", "attempts"],
  }),
  keywordRule("measurement", "measurement", "measurement", {
    tokens: [
      "weight",
      "height",
      "width",
      "length",
      "depth",
      "distance",
      "size",
      "volume",
      "area",
      "temperature",
      "mass",
      "duration",
      "speed",
      "altitude",
      "elevation",
    ],
  }),

  // version
  keywordRule("version", "version", "version", { tokens: ["version", "semver", "release", "build"] }),

  // remaining names: a person for a bare "name", a short label for anything else named
  keywordRule("bare-name", "personal", "full-name", {
    exact: ["name"],
  }),
  keywordRule("label", "content", "label", {
    tokens: ["name", "label", "alias"],
    unlessTokens: ["user", "file", "domain", "host"],
  }),
];
