/**
 * Person and organisation derived values: usernames, email addresses, domains
 */

import type { Faker } from "@faker-js/faker";
import type { RowContext } from "../context/index.js";

export const EMAIL_PROVIDERS = ["gmail.com", "yahoo.com", "outlook.com", "example.com"] as const;

/**
 * Lower-case and drop everything that cannot appear in a plain email local part
 */
export function toLocalPart(value: string): string {
  return value
    .normalize("NFKD")
    .toLowerCase()
    .replace(/[^a-z0-9]/g, "");
}

export function domainFromOrganization(organization: string): string | undefined {
  const stem = toLocalPart(organization);
  return stem.length > 0 ? `${stem}.com` : undefined;
}

export function fullName(random: Faker, context: RowContext): string {
  const first = context.get("first_name");
  const last = context.get("last_name");
  if (first !== undefined && last !== undefined) {
    return `${first} ${last}`;
  }
  return random.person.fullName();
}

function nameHandle(context: RowContext): string | undefined {
  const first = context.get("first_name");
  const last = context.get("last_name");
  if (first === undefined || last === undefined) {
    return undefined;
  }

  const handle = [toLocalPart(first), toLocalPart(last)].filter((part) => part.length > 0).join(".");
  return handle.length > 0 ? handle : undefined;
}

/**
 * first.last from the row context, else user<n>
 */
export function username(context: RowContext, rowIndex: number): string {
  return nameHandle(context) ?? `user${rowIndex + 1}`;
}

export function domainName(random: Faker, context: RowContext): string {
  const company = context.get("company_name");
  const derived = company === undefined ? undefined : domainFromOrganization(company);
  return derived ?? `${toLocalPart(random.internet.domainWord()) || "site"}.com`;
}

function emailLocalPart(context: RowContext, rowIndex: number): string {
  const user = context.get("username");
  if (user !== undefined) {
    const cleaned = user
      .toLowerCase()
      .replace(/[^a-z0-9._-]/g, "")
      .replace(/^\.+|\.+$/g, "");
    if (cleaned.length > 0) return cleaned;
  }

  const handle = nameHandle(context);
  if (handle !== undefined) return handle;

  const full = context.get("full_name");
  if (full !== undefined) {
    const parts = full.split(/\s+/).map(toLocalPart).filter((part) => part.length > 0);
    if (parts.length > 0) return parts.join(".");
  }

  if (context.has("company_name")) return "info";

  return `user${rowIndex + 1}`;
}

function emailDomain(random: Faker, context: RowContext): string {
  const domain = context.get("domain_name");
  if (domain !== undefined) return domain;

  const company = context.get("company_name");
  const derived = company === undefined ? undefined : domainFromOrganization(company);
  return derived ?? random.helpers.arrayElement(EMAIL_PROVIDERS);
}

export function email(random: Faker, context: RowContext, rowIndex: number): string {
  return `${emailLocalPart(context, rowIndex)}@${emailDomain(random, context)}`;
}

export function websiteUrl(random: Faker, context: RowContext): string {
  const domain = context.get("domain_name");
  if (domain !== undefined) return `https://www.${domain}`;

  const company = context.get("company_name");
  const derived = company === undefined ? undefined : domainFromOrganization(company);
  return derived ? `https://www.${derived}` : random.internet.url();
}
