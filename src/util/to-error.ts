/**
 * Normalizes a caught value to an Error.
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * Joins a multi-line message into a single line.
 */
export function singleLine(message: string): string {
    return message.replace(/\s*\n\s*/g, ' ').trim();
}
