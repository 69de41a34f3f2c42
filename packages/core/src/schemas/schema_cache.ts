import Ajv from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import type { ValidationError } from "../errors";

/**
 * Singleton cache for schema validators to avoid repeated AJV compilation.
 */
export class SchemaValidationCache {
  private static schemaValidators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true, verbose: true, strict: false });
      addFormats(this.ajv);
    }
    return this.ajv;
  }

  /**
   * Gets or creates a cached validator for a schema object.
   * @param schema The schema object (already parsed JSON)
   */
  static getValidatorFromSchema(schema: object): ValidateFunction {
    const schemaKey = JSON.stringify(schema);
    const cached = this.schemaValidators.get(schemaKey);
    if (cached) return cached;

    // $id is dropped so the same schema loaded from two places never collides
    const schemaWithoutId = Object.fromEntries(
      Object.entries(schema).filter(([key]) => key !== "$id")
    );
    const validator = this.getAjv().compile(schemaWithoutId);
    this.schemaValidators.set(schemaKey, validator);
    return validator;
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.schemaValidators.clear();
    this.ajv = null;
  }

  static getCacheStats(): { cachedSchemas: number } {
    return { cachedSchemas: this.schemaValidators.size };
  }
}

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): ValidationError[] {
  return (errors ?? []).map((error) => {
    const missing: unknown = error.params["missingProperty"];
    const field = error.instancePath.replace(/^\//, "").replace(/\//g, ".")
      || (typeof missing === "string" ? missing : "")
      || "root";
    return {
      field,
      message: error.message || "Unknown validation error",
      value: error.data,
    };
  });
}

/**
 * Validates `data` against `schema` and returns field-level errors.
 */
export function validateAgainstSchema(schema: object, data: unknown): ValidationError[] {
  const validate = SchemaValidationCache.getValidatorFromSchema(schema);
  return validate(data) ? [] : formatAjvErrors(validate.errors);
}
