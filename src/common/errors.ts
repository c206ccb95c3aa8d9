/**
 * Error taxonomy for the type and schema model
 * Every construction-time violation is raised eagerly at the call that introduces it
 */
export abstract class TypeSystemError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Out-of-range decimal precision/scale, negative fixed length, bad nested ids
 */
export class InvalidTypeParameterError extends TypeSystemError {}

/**
 * Field id outside the 32-bit range or an empty field name
 */
export class InvalidFieldError extends TypeSystemError {}

export class DuplicateFieldIdError extends TypeSystemError {
  constructor(readonly fieldId: number, context?: string) {
    super(`Duplicate field id ${fieldId}${context ? ` in ${context}` : ''}`);
  }
}

export class DuplicateFieldNameError extends TypeSystemError {
  constructor(readonly fieldName: string, context?: string) {
    super(`Duplicate field name '${fieldName}'${context ? ` in ${context}` : ''}`);
  }
}

export class UnknownTypeError extends TypeSystemError {
  constructor(readonly typeString: string) {
    super(`Cannot parse type string: '${typeString}'`);
  }
}

/**
 * Schema-level option that cannot hold, such as a negative schema id
 */
export class InvalidSchemaError extends TypeSystemError {}

export class InvalidIdentifierFieldError extends InvalidSchemaError {}

/**
 * Malformed, truncated or internally inconsistent persisted representation
 * `path` points at the JSON location that failed (e.g. `$.schema.fields[2].type`)
 */
export class DeserializationError extends TypeSystemError {
  constructor(message: string, readonly path: string = '$', cause?: unknown) {
    super(`Cannot deserialize at ${path}: ${message}`, { cause });
  }
}
