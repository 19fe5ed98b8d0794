export type RenderFailureKind = 'syntax' | 'undefined_variable' | 'not_found';

const KIND_LABELS: Record<RenderFailureKind, string> = {
    syntax: 'Bad template',
    undefined_variable: 'Missing variable',
    not_found: 'Template not found',
};

/**
 * Error thrown when the template engine cannot render a template.
 * Always fatal to the whole run.
 */
export class RenderError extends Error {
    public readonly kind: RenderFailureKind;
    /** Template identifier relative to the template root */
    public readonly template: string;
    /** The engine's own message */
    public readonly diagnostic: string;
    /** Stack being rendered, when known */
    public readonly stackName?: string;
    public readonly originalError?: Error;

    constructor(
        kind: RenderFailureKind,
        template: string,
        diagnostic: string,
        stackName?: string,
        originalError?: Error
    ) {
        const where = stackName === undefined ? '' : ` for stack "${stackName}"`;
        super(`${KIND_LABELS[kind]} "${template}"${where}: ${diagnostic}`);
        this.name = 'RenderError';
        this.kind = kind;
        this.template = template;
        this.diagnostic = diagnostic;
        this.stackName = stackName;
        this.originalError = originalError;
        Object.setPrototypeOf(this, RenderError.prototype);
    }

    /**
     * Returns the same failure, attributed to a stack.
     */
    forStack(stackName: string): RenderError {
        return new RenderError(this.kind, this.template, this.diagnostic, stackName, this.originalError);
    }
}
