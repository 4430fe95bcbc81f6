import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';
import { ValidationError, type ValidationIssue } from '../errors/connectorErrors.js';
import { err, ok, type Result } from '../flows/result.js';

/** Any schema whose parsed output is T, whatever it accepts as input. */
export type SchemaOf<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Validates without throwing. Failures are logged with their paths only,
 * never with the offending data.
 */
export function safeValidate<T>(schema: SchemaOf<T>, data: unknown, context: string): Result<T, ValidationError> {
    const result = schema.safeParse(data);

    if (!result.success) {
        const issues: ValidationIssue[] = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({ context, errors: issues }, 'Input validation failure');

        return err(new ValidationError(context, issues));
    }

    return ok(result.data);
}

/**
 * Returns the parsed value or throws ValidationError.
 */
export function validate<T>(schema: SchemaOf<T>, data: unknown, context: string): T {
    const result = safeValidate(schema, data, context);
    if (!result.ok) {
        throw result.error;
    }
    return result.value;
}

/**
 * Factory for creating bound validators.
 */
export const createValidator = <T>(schema: SchemaOf<T>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
