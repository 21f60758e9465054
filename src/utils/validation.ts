/**
 * Shared Ajv instance for validating schema description and configuration files
 */

import AjvModule, { type ErrorObject } from "ajv";

const Ajv = AjvModule.default;

export const ajv = new Ajv({
  allErrors: true, // Report every offending path, not only the first
  strict: true,
  allowUnionTypes: true, // Sample values may be strings, numbers or booleans
});

/**
 * Render Ajv errors as "path: message" lines
 */
export function formatValidationErrors(errors: readonly ErrorObject[] | null | undefined): string[] {
  if (!errors) return [];

  return errors.map((error) => {
    const path =
      error.keyword === "required" && "missingProperty" in error.params
        ? `${error.instancePath}/${String(error.params.missingProperty)}`
        : error.instancePath || "/";
    return `${path}: ${error.message ?? error.keyword}`;
  });
}
