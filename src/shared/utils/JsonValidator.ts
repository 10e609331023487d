/**
 * JSON Validator
 *
 * JSON parsing with shape validation through type-guard validators.
 */

/**
 * Simple type validator function
 */
export type Validator<T> = (value: unknown) => value is T;

/**
 * Validation result
 */
export type ValidationResult<T> =
    | { success: true; data: T }
    | { success: false; error: string };

/**
 * Built-in validators for common types
 */
export const Validators = {
    string: (value: unknown): value is string => typeof value === 'string',
    number: (value: unknown): value is number => typeof value === 'number' && !isNaN(value),
    boolean: (value: unknown): value is boolean => typeof value === 'boolean',
    array: <T>(itemValidator?: Validator<T>) => (value: unknown): value is T[] => {
        if (!Array.isArray(value)) return false;
        if (itemValidator) {
            return value.every(item => itemValidator(item));
        }
        return true;
    },
    object: (value: unknown): value is Record<string, unknown> =>
        typeof value === 'object' && value !== null && !Array.isArray(value),
    optional: <T>(validator: Validator<T>) => (value: unknown): value is T | undefined =>
        value === undefined || validator(value),
};

/**
 * Create a validator for an object shape. Keys the shape does not name are
 * ignored.
 */
export function createObjectValidator<T extends Record<string, unknown>>(
    shape: { [K in keyof T]-?: (value: unknown) => boolean }
): Validator<T> {
    return (value: unknown): value is T => {
        if (!Validators.object(value)) return false;
        for (const key in shape) {
            if (!shape[key](value[key])) {
                return false;
            }
        }
        return true;
    };
}

export class JsonValidator {
    /**
     * Parse a JSON string and check it against the validator
     */
    static parse<T>(jsonString: string, validator: Validator<T>): ValidationResult<T> {
        let parsed: unknown;
        try {
            parsed = JSON.parse(jsonString);
        } catch (error) {
            return {
                success: false,
                error: error instanceof Error ? error.message : String(error)
            };
        }

        if (!validator(parsed)) {
            return {
                success: false,
                error: 'Validation failed: data does not match expected shape'
            };
        }

        return { success: true, data: parsed };
    }
}

export default JsonValidator;
