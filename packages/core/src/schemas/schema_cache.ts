import Ajv from "ajv";
import type { ValidateFunction } from "ajv";

/**
 * Singleton cache of compiled AJV validators, keyed by schema content.
 */
export class SchemaValidationCache {
  private static schemaValidators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  /**
   * Gets or creates a cached validator for a schema object.
   * @param schema The schema object (already parsed JSON)
   */
  static getValidatorFromSchema(schema: object): ValidateFunction {
    const schemaKey = JSON.stringify(schema);

    const cached = this.schemaValidators.get(schemaKey);
    if (cached) {
      return cached;
    }

    // Ajv refuses two schemas registered under one $id
    const schemaWithoutId = Object.fromEntries(
      Object.entries(schema).filter(([key]) => key !== '$id')
    );
    const validator = this.getAjv().compile(schemaWithoutId);
    this.schemaValidators.set(schemaKey, validator);

    return validator;
  }

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true, verbose: true });
    }
    return this.ajv;
  }

  /**
   * Clears the cache (useful for testing).
   */
  static clearCache(): void {
    this.schemaValidators.clear();
    this.ajv = null;
  }

  static getCacheStats(): { cachedSchemas: number } {
    return {
      cachedSchemas: this.schemaValidators.size
    };
  }
}
