/**
 * Error thrown when a merge meets a key that is a mapping on one side and
 * a scalar or list on the other.
 */
export class StructuralMismatchError extends Error {
    /** Dotted path of the key from the top of the merge */
    public readonly keyPath: string[];
    public readonly baseValue: unknown;
    public readonly overrideValue: unknown;
    /** File or stack the merge was performed for, when known */
    public readonly location?: string;

    constructor(keyPath: string[], baseValue: unknown, overrideValue: unknown, location?: string) {
        const where = location ? ` in ${location}` : '';
        super(
            `Incompatible structure for key "${keyPath.join('.')}"${where}: ` +
            `${describeValue(baseValue)} vs. ${describeValue(overrideValue)}`
        );
        this.name = 'StructuralMismatchError';
        this.keyPath = keyPath;
        this.baseValue = baseValue;
        this.overrideValue = overrideValue;
        this.location = location;
        Object.setPrototypeOf(this, StructuralMismatchError.prototype);
    }

    /** The innermost conflicting key */
    get key(): string {
        return this.keyPath[this.keyPath.length - 1] ?? '';
    }

    /**
     * Returns the same conflict, attributed to a file or stack.
     */
    at(location: string): StructuralMismatchError {
        return new StructuralMismatchError(this.keyPath, this.baseValue, this.overrideValue, location);
    }
}

function describeValue(value: unknown): string {
    if (value instanceof Date) return value.toISOString();
    const json = JSON.stringify(value);
    return json === undefined ? String(value) : json;
}
