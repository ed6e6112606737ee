import type { ZodError } from "zod";

/**
 * Base application error class.
 * All domain errors should extend this.
 */
export class AppError extends Error {
    constructor(
        message: string,
        public readonly code: string
    ) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Invalid classifier configuration. Raised once, when the config is built.
 */
export class ConfigError extends AppError {
    constructor(message: string, public readonly issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, "INVALID_CONFIG");
    }
}

/**
 * Input records that do not match the video record shape.
 */
export class InvalidInputError extends AppError {
    constructor(message: string, public readonly issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, "INVALID_INPUT");
    }
}

/**
 * Flatten zod issues to "path: message" strings.
 */
export function formatZodIssues(error: ZodError, prefix?: string): string[] {
    return error.issues.map(issue => {
        const path = [prefix, ...issue.path].filter(p => p !== undefined && p !== "").join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}
