import { ZodError } from 'zod';

export type ConfigurationErrorType = 'validation' | 'directive' | 'missing_level';

/**
 * Error thrown when run options or a stack's resolved configuration are invalid,
 * or when the level table is inconsistent.
 */
export class ConfigurationError extends Error {
    public readonly errorType: ConfigurationErrorType;
    public readonly details?: unknown;
    public readonly configPath?: string;

    constructor(
        errorType: ConfigurationErrorType,
        message: string,
        details?: unknown,
        configPath?: string
    ) {
        super(message);
        this.name = 'ConfigurationError';
        this.errorType = errorType;
        this.details = details;
        this.configPath = configPath;
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }

    /**
     * Run options failed schema validation.
     */
    static validation(message: string, zodError?: ZodError, configPath?: string): ConfigurationError {
        return new ConfigurationError('validation', message, zodError, configPath);
    }

    /**
     * The `templates` or `exclude` keys of a stack have the wrong shape.
     */
    static directive(stackName: string, zodError: ZodError): ConfigurationError {
        return new ConfigurationError(
            'directive',
            `Invalid template directives for stack "${stackName}": ${formatIssues(zodError)}`,
            zodError,
            stackName
        );
    }

    /**
     * A stack's ancestor is absent from the level table.
     */
    static missingLevel(levelName: string, stackName: string): ConfigurationError {
        return new ConfigurationError(
            'missing_level',
            `Level "${levelName}" required by stack "${stackName}" is missing from the level table`,
            { level: levelName },
            stackName
        );
    }
}

/**
 * Joins zod issues into a single line, e.g. `exclude: Expected array, received string`.
 */
export function formatIssues(zodError: ZodError): string {
    return zodError.issues
        .map(issue => `${issue.path.join('.') || 'root'}: ${issue.message}`)
        .join('; ');
}
