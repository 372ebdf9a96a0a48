/**
 * JSON Validator
 *
 * Safe JSON parsing with type-guard validation, plus the deep merge used to
 * lay command-line overrides over a configuration file.
 */

import * as fs from 'fs';
import { ErrorHandler, ErrorSeverity, type ErrorContext } from './ErrorHandler.js';
import { ContractError } from './errors.js';

export type JsonObject = Record<string, unknown>;

/**
 * Simple type validator function
 */
export type Validator<T> = (value: unknown) => value is T;

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
    object: (value: unknown): value is JsonObject =>
        typeof value === 'object' && value !== null && !Array.isArray(value)
};

export class JsonValidator {
    /**
     * Parse JSON string safely
     */
    static parse<T>(
        jsonString: string,
        validator: Validator<T>,
        context?: string
    ): ValidationResult<T> {
        const errorContext: ErrorContext = {
            component: 'JsonValidator',
            operation: 'parse',
            data: context ? { context } : undefined
        };

        let parsed: unknown;
        try {
            parsed = JSON.parse(jsonString);
        } catch (error) {
            const info = ErrorHandler.handle(error, errorContext, ErrorSeverity.SILENT);
            return { success: false, error: info.message };
        }

        if (!validator(parsed)) {
            return {
                success: false,
                error: 'Validation failed: data does not match expected shape'
            };
        }
        return { success: true, data: parsed };
    }

    /**
     * Parse a JSON file that must exist and validate.
     * @throws ContractError when the file is missing, unreadable or malformed
     */
    static parseFile<T>(filePath: string, validator: Validator<T>): T {
        if (!fs.existsSync(filePath)) {
            throw new ContractError(`File not found: ${filePath}`, { filePath });
        }

        const content = fs.readFileSync(filePath, 'utf-8');
        const result = this.parse(content, validator, filePath);
        if (!result.success) {
            throw new ContractError(`${filePath}: ${result.error}`, { filePath });
        }
        return result.data;
    }

    /**
     * Merge objects deeply. Arrays and scalars from `source` replace those in `target`.
     */
    static deepMerge(target: JsonObject, source: JsonObject): JsonObject {
        const result: JsonObject = { ...target };

        for (const key of Object.keys(source)) {
            const sourceValue = source[key];
            const targetValue = result[key];

            if (Validators.object(sourceValue) && Validators.object(targetValue)) {
                result[key] = this.deepMerge(targetValue, sourceValue);
            } else if (sourceValue !== undefined) {
                result[key] = sourceValue;
            }
        }

        return result;
    }
}
