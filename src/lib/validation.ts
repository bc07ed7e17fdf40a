/**
 * Input Validation Utilities
 *
 * Type-safe validation for untyped input (parsed YAML, env overrides,
 * persisted snapshots).
 */

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; error: string };

/**
 * Narrow an unknown value to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a string field
 */
export function validateString(
  value: unknown,
  fieldName: string,
  options: { minLength?: number; maxLength?: number; pattern?: RegExp } = {}
): ValidationResult<string> {
  if (typeof value !== 'string') {
    return { valid: false, error: `${fieldName} must be a string` };
  }

  if (options.minLength !== undefined && value.length < options.minLength) {
    return { valid: false, error: `${fieldName} must be at least ${options.minLength} characters` };
  }

  if (options.maxLength !== undefined && value.length > options.maxLength) {
    return { valid: false, error: `${fieldName} must be at most ${options.maxLength} characters` };
  }

  if (options.pattern && !options.pattern.test(value)) {
    return { valid: false, error: `${fieldName} has invalid format` };
  }

  return { valid: true, value };
}

/**
 * Validate a number field
 */
export function validateNumber(
  value: unknown,
  fieldName: string,
  options: { min?: number; max?: number; integer?: boolean } = {}
): ValidationResult<number> {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return { valid: false, error: `${fieldName} must be a valid number` };
  }

  if (options.integer && !Number.isInteger(value)) {
    return { valid: false, error: `${fieldName} must be an integer` };
  }

  if (options.min !== undefined && value < options.min) {
    return { valid: false, error: `${fieldName} must be at least ${options.min}` };
  }

  if (options.max !== undefined && value > options.max) {
    return { valid: false, error: `${fieldName} must be at most ${options.max}` };
  }

  return { valid: true, value };
}

/**
 * Validate a positive number
 */
export function validatePositiveNumber(
  value: unknown,
  fieldName: string,
  options: { allowZero?: boolean; integer?: boolean } = {}
): ValidationResult<number> {
  const numResult = validateNumber(value, fieldName, { integer: options.integer });
  if (!numResult.valid) return numResult;

  if (numResult.value < 0 || (!options.allowZero && numResult.value === 0)) {
    return { valid: false, error: `${fieldName} must be positive` };
  }

  return numResult;
}

/**
 * Validate a boolean field
 */
export function validateBoolean(value: unknown, fieldName: string): ValidationResult<boolean> {
  if (typeof value !== 'boolean') {
    return { valid: false, error: `${fieldName} must be a boolean` };
  }
  return { valid: true, value };
}

/**
 * Validate enum value
 */
export function validateEnum<T extends string>(
  value: unknown,
  fieldName: string,
  allowedValues: readonly T[]
): ValidationResult<T> {
  if (typeof value !== 'string') {
    return { valid: false, error: `${fieldName} must be a string` };
  }

  const match = allowedValues.find(allowed => allowed === value);
  if (match === undefined) {
    return {
      valid: false,
      error: `${fieldName} must be one of: ${allowedValues.join(', ')}`
    };
  }

  return { valid: true, value: match };
}

/**
 * Validate a perp market symbol (e.g. BTC, ETH-PERP, 1000PEPE)
 */
export function validateSymbol(value: unknown, fieldName: string = 'symbol'): ValidationResult<string> {
  const stringResult = validateString(value, fieldName, {
    minLength: 1,
    maxLength: 20,
    pattern: /^[A-Z0-9][A-Z0-9._-]*$/i,
  });

  if (!stringResult.valid) return stringResult;

  return { valid: true, value: stringResult.value.toUpperCase() };
}

/**
 * Validate order type
 */
export function validateOrderType(value: unknown, fieldName: string = 'orderType'): ValidationResult<'market' | 'limit'> {
  return validateEnum(value, fieldName, ['market', 'limit'] as const);
}

/**
 * Validate a non-empty list of symbols, deduplicated
 */
export function validateSymbolList(value: unknown, fieldName: string): ValidationResult<string[]> {
  if (!Array.isArray(value) || value.length === 0) {
    return { valid: false, error: `${fieldName} must be a non-empty list` };
  }

  const symbols: string[] = [];
  for (const [index, item] of value.entries()) {
    const result = validateSymbol(item, `${fieldName}[${index}]`);
    if (!result.valid) return result;
    if (!symbols.includes(result.value)) symbols.push(result.value);
  }

  return { valid: true, value: symbols };
}
