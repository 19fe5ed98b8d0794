/**
 * Error thrown when a command-line argument or function argument is invalid.
 */
export class ArgumentError extends Error {
    private argumentName: string;

    constructor(argumentName: string, message: string) {
        super(message);
        this.name = 'ArgumentError';
        this.argumentName = argumentName;
        Object.setPrototypeOf(this, ArgumentError.prototype);
    }

    /** Name of the offending argument */
    get argument(): string {
        return this.argumentName;
    }
}
