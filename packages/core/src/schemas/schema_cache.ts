import Ajv from "ajv";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { SchemaValidationError } from "../errors";

/**
 * Shared AJV instance plus lazily compiled validators.
 * Each schema compiles once, on first use.
 */
export class SchemaValidationCache {
  private static ajv: Ajv | null = null;

  static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true, verbose: true });
      addFormats(this.ajv);
    }
    return this.ajv;
  }

  /**
   * Returns an accessor for the compiled validator of `schema`.
   * @param schema The schema object (already parsed JSON)
   */
  static validatorFor<T>(schema: SchemaObject): () => ValidateFunction<T> {
    let validator: ValidateFunction<T> | null = null;
    return () => {
      if (!validator) {
        validator = SchemaValidationCache.getAjv().compile<T>(schema);
      }
      return validator;
    };
  }

  /**
   * Drops the shared AJV instance (useful for testing).
   * Accessors created earlier keep their compiled validators.
   */
  static clearCache(): void {
    this.ajv = null;
  }
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): SchemaValidationError['errors'] {
  return errors?.map(error => ({
    field: error.instancePath || error.schemaPath,
    message: error.message || 'Validation failed',
    value: error.data
  })) || [];
}

/**
 * Throws SchemaValidationError unless `data` satisfies the validator.
 */
export function assertSchema<T>(
  validator: ValidateFunction<T>,
  data: unknown,
  typeName: string
): asserts data is T {
  if (!validator(data)) {
    throw new SchemaValidationError(typeName, formatSchemaErrors(validator.errors));
  }
}
