/**
 * Synthesizer module - produces one SQL literal per column from its semantic category,
 * the values already chosen in the same row and the reference pools of earlier tables
 */

import type { Faker } from "@faker-js/faker";
import type { SemanticType } from "../classifier/semantic-types.js";
import {
  CLASSIFICATION_LEVELS,
  PRIORITY_LEVELS,
  ROLES,
  SKILL_LEVELS,
  STATUS_VALUES,
  TIERS,
} from "../classifier/vocabularies.js";
import type { RowContext } from "../context/index.js";
import type { ReferencePool } from "../pool/index.js";
import { isIntegerType, isNumericType, type Column, type DataType } from "../../types/schema-model.js";
import {
  NULL_LITERAL,
  booleanLiteral,
  numberLiteral,
  textLiteral,
  type SqlLiteral,
} from "../../types/sql-literal.js";
import type { MissingReferenceStrategy, SynthesizerOptions } from "./types.js";
import {
  birthDate,
  endDate,
  formatForType,
  recentDate,
  startDate,
  updateDate,
} from "./temporal.js";
import { macAddress, port, privateIPv4 } from "./network.js";
import { amountBetween, decimalForPrecision, isNumericString, money } from "./numeric.js";
import { domainName, email, fullName, username, websiteUrl } from "./identity.js";
import { code, description, fictionPlace, fitLength, longText, title } from "./text.js";

export * from "./types.js";
export * from "./temporal.js";
export * from "./network.js";
export * from "./numeric.js";
export * from "./identity.js";
export * from "./text.js";

const UUID_LENGTH = 36;

function assertNever(value: never): never {
  throw new Error(`Unhandled semantic category: ${JSON.stringify(value)}`);
}

/**
 * Postgres array literal of quoted elements
 */
export function arrayLiteral(items: readonly string[]): string {
  return `{${items.map((item) => `"${item.replace(/["\\]/g, "\\$&")}"`).join(",")}}`;
}

export class ValueSynthesizer {
  private random: Faker;
  private pools: ReferencePool;
  private now: Date;
  private onMissingReference: MissingReferenceStrategy;

  constructor(options: SynthesizerOptions) {
    this.random = options.random;
    this.pools = options.pools;
    this.now = options.now ?? new Date();
    this.onMissingReference = options.onMissingReference ?? "default";
  }

  synthesize(semantic: SemanticType, column: Column, context: RowContext, rowIndex: number): SqlLiteral {
    const random = this.random;
    const type = column.dataType;

    switch (semantic.category) {
      case "primary-key":
        return this.identifier(type, rowIndex);
      case "foreign-key":
        return this.reference(semantic.referencedTable, column, rowIndex);
      case "uuid":
        return this.text(random.string.uuid(), type);

      case "first-name":
        return this.text(random.person.firstName(), type);
      case "last-name":
        return this.text(random.person.lastName(), type);
      case "full-name":
        return this.text(fullName(random, context), type);
      case "username":
        return this.text(username(context, rowIndex), type);
      case "gender":
        return this.text(random.person.sex(), type);
      case "birth-date":
        return this.text(formatForType(birthDate(random, this.now), type), type);
      case "job-title":
        return this.text(random.person.jobTitle(), type);

      case "company-name":
        return this.text(random.company.name(), type);
      case "department":
        return this.text(random.commerce.department(), type);

      case "street-address":
        return this.text(random.location.streetAddress(), type);
      case "city":
        return this.text(random.location.city(), type);
      case "state":
        return this.text(random.location.state(), type);
      case "country":
        return this.text(random.location.country(), type);
      case "country-code":
        return this.text(random.location.countryCode("alpha-2"), type);
      case "postal-code":
        return this.text(random.location.zipCode(), type);
      case "latitude":
        return this.number(random.location.latitude({ precision: 6 }), type);
      case "longitude":
        return this.number(random.location.longitude({ precision: 6 }), type);
      case "timezone":
        return this.text(random.location.timeZone(), type);

      case "email":
        return this.text(email(random, context, rowIndex), type);
      case "phone":
        return this.text(random.phone.number(), type);

      case "mac-address":
        return this.text(macAddress(random), type);
      case "ipv4":
        return this.text(privateIPv4(random), type);
      case "ipv6":
        return this.text(random.internet.ipv6(), type);
      case "port":
        return this.numeric(String(port(random)), type);
      case "url":
        return this.text(websiteUrl(random, context), type);
      case "domain":
        return this.text(domainName(random, context), type);
      case "hostname":
        return this.text(random.internet.domainName(), type);
      case "user-agent":
        return this.text(random.internet.userAgent(), type);

      case "start-date":
        return this.text(formatForType(startDate(random, this.now), type), type);
      case "end-date":
        return this.text(
          formatForType(endDate(random, this.now, context.getMostRecentStartDate()), type),
          type,
        );
      case "updated-date":
        return this.text(formatForType(updateDate(random, this.now), type), type);
      case "timestamp":
        return this.text(formatForType(recentDate(random, this.now), type), type);
      case "year": {
        const current = this.now.getUTCFullYear();
        return this.numeric(String(random.number.int({ min: current - 30, max: current })), type);
      }

      case "money":
        return this.numeric(money(random, type), type);
      case "currency-code":
        return this.text(random.finance.currencyCode(), type);
      case "credit-card":
        return this.text(random.finance.creditCardNumber(), type);
      case "iban":
        return this.text(random.finance.iban(), type);
      case "account-number":
        return this.text(random.finance.accountNumber(10), type);

      case "hash":
        return this.text(random.string.hexadecimal({ length: 64, casing: "lower", prefix: "" }), type);
      case "token":
        return this.text(random.string.alphanumeric(32), type);

      case "status":
        return this.vocabulary(column, STATUS_VALUES);
      case "priority":
        return this.vocabulary(column, PRIORITY_LEVELS);
      case "skill-level":
        return this.vocabulary(column, SKILL_LEVELS);
      case "classification":
        return this.vocabulary(column, CLASSIFICATION_LEVELS);
      case "tier":
        return this.vocabulary(column, TIERS);
      case "role":
        return this.vocabulary(column, ROLES);
      case "category":
        return this.text(random.commerce.department(), type);

      case "code":
        return this.text(code(random, column.name), type);
      case "fiction-place":
        return this.text(fictionPlace(random), type);

      case "title":
        return this.text(title(random), type);
      case "description":
        return this.text(description(random), type);
      case "long-text":
        return this.text(longText(random), type);
      case "product-name":
        return this.text(random.commerce.productName(), type);
      case "label":
        return this.text(random.lorem.words({ min: 1, max: 3 }), type);
      case "color":
        return this.text(random.color.human(), type);
      case "tags": {
        const tags = random.lorem.words({ min: 1, max: 4 }).split(" ");
        return type.tag === "array" ? textLiteral(arrayLiteral(tags)) : this.text(tags.join(","), type);
      }

      case "mime-type":
        return this.text(random.system.mimeType(), type);
      case "file-path":
        return this.text(random.system.filePath(), type);
      case "file-name":
        return this.text(random.system.fileName(), type);

      case "percentage":
        return this.numeric(amountBetween(random, type, 0, 100), type);
      case "rating":
        return this.numeric(String(random.number.int({ min: 1, max: 5 })), type);
      case "age":
        return this.numeric(String(random.number.int({ min: 18, max: 80 })), type);
      case "quantity":
        return this.numeric(amountBetween(random, type, 1, 1000), type);
      case "capacity":
        return this.numeric(amountBetween(random, type, 10, 10000), type);
      case "measurement":
        return this.numeric(amountBetween(random, type, 0, 1000), type);

      case "version":
        return this.text(random.system.semver(), type);

      case "sampled":
        return this.sampled(column);

      case "boolean":
        return booleanLiteral(random.datatype.boolean());
      case "integer":
        return this.numeric(amountBetween(random, type, 1, 1000), type);
      case "decimal":
        return this.numeric(decimalForPrecision(random, type), type);
      case "json":
        return textLiteral(JSON.stringify({ generated: true, tag: random.lorem.word() }));
      case "array":
        return textLiteral(arrayLiteral(random.lorem.words({ min: 1, max: 3 }).split(" ")));
      case "text":
        return this.text(random.lorem.words({ min: 1, max: 4 }), type);
      case "unknown":
        return NULL_LITERAL;

      default:
        return assertNever(semantic);
    }
  }

  /**
   * rowIndex + 1 for numeric keys and for text keys too short to hold a UUID
   */
  private identifier(type: DataType, rowIndex: number): SqlLiteral {
    if (isNumericType(type)) {
      return numberLiteral(rowIndex + 1);
    }
    if (type.tag !== "uuid" && type.length !== undefined && type.length < UUID_LENGTH) {
      return textLiteral(String(rowIndex + 1));
    }
    return textLiteral(this.random.string.uuid());
  }

  private reference(referencedTable: string, column: Column, rowIndex: number): SqlLiteral {
    const value = this.pools.pick(referencedTable, this.random);
    if (value === undefined) {
      if (this.onMissingReference === "null" && column.nullable) {
        return NULL_LITERAL;
      }
      return this.identifier(column.dataType, rowIndex);
    }
    return isNumericType(column.dataType) && isNumericString(value) ? numberLiteral(value) : textLiteral(value);
  }

  /**
   * Draw from the column's own samples when it has them, else from the fixed vocabulary
   */
  private vocabulary(column: Column, values: readonly string[]): SqlLiteral {
    const samples = column.samples && column.samples.length > 0 ? column.samples : values;
    return this.text(this.random.helpers.arrayElement(samples), column.dataType);
  }

  private sampled(column: Column): SqlLiteral {
    if (!column.samples || column.samples.length === 0) {
      return this.text(this.random.lorem.word(), column.dataType);
    }
    return this.numeric(this.random.helpers.arrayElement(column.samples), column.dataType);
  }

  private text(value: string, type: DataType): SqlLiteral {
    return textLiteral(fitLength(value, type.length));
  }

  /**
   * Unquoted when the column is numeric and the value reads as a number, quoted text otherwise
   */
  private numeric(value: string, type: DataType): SqlLiteral {
    return isNumericType(type) && isNumericString(value) ? numberLiteral(value.trim()) : this.text(value, type);
  }

  private number(value: number, type: DataType): SqlLiteral {
    if (isIntegerType(type)) {
      return numberLiteral(Math.round(value));
    }
    return this.numeric(String(value), type);
  }
}
