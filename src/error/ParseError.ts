export type ParseFailureReason = 'syntax' | 'decode' | 'not_mapping';

/**
 * Error thrown when a variables file cannot be turned into a mapping.
 */
export class ParseError extends Error {
    public readonly reason: ParseFailureReason;
    public readonly filePath: string;
    public readonly originalError?: Error;

    constructor(reason: ParseFailureReason, message: string, filePath: string, originalError?: Error) {
        super(message);
        this.name = 'ParseError';
        this.reason = reason;
        this.filePath = filePath;
        this.originalError = originalError;
        Object.setPrototypeOf(this, ParseError.prototype);
    }

    static syntax(filePath: string, originalError: Error, diagnostic: string = originalError.message): ParseError {
        return new ParseError('syntax', `Unable to parse ${filePath}: ${diagnostic}`, filePath, originalError);
    }

    static decode(filePath: string, encoding: string, originalError: Error): ParseError {
        return new ParseError(
            'decode',
            `Unable to decode ${filePath} as ${encoding}: ${originalError.message}`,
            filePath,
            originalError
        );
    }

    static notMapping(filePath: string, kind: string): ParseError {
        return new ParseError('not_mapping', `Expected a mapping in ${filePath}, found ${kind}`, filePath);
    }
}
