import { StackDirectives } from '../types';

export interface SelectionOptions {
    /** Appended to each name listed under `templates` or `exclude` */
    templateExtension: string;
    /** Top-level template directory that is never rendered directly */
    partialsDirectory: string;
}

/**
 * Decides which templates a stack renders.
 *
 * 1. An explicit `templates` list selects exactly those names, in order, as `<name><extension>`.
 * 2. Without it, every available template is a candidate.
 * 3. Names under `exclude` are removed; excluding an unknown name does nothing.
 * 4. Anything under the partials directory is removed, even when listed explicitly.
 *
 * @example
 * ```typescript
 * selectTemplates(
 *   { templates: ['alpha', 'beta'], exclude: ['beta'] },
 *   ['alpha.yaml', 'beta.yaml', 'gamma.yaml'],
 *   { templateExtension: '.yaml', partialsDirectory: 'partials' }
 * ); // ['alpha.yaml']
 * ```
 */
export function selectTemplates(
    directives: StackDirectives,
    available: readonly string[],
    options: SelectionOptions
): string[] {
    const toIdentifier = (name: string) => `${name}${options.templateExtension}`;

    const candidates = directives.templates !== undefined
        ? unique(directives.templates.map(toIdentifier))
        : [...available];

    const excluded = new Set((directives.exclude ?? []).map(toIdentifier));

    return candidates.filter(identifier =>
        !excluded.has(identifier) && !isPartial(identifier, options.partialsDirectory)
    );
}

/**
 * True when a template lives under the partials directory.
 */
export function isPartial(identifier: string, partialsDirectory: string): boolean {
    return identifier.startsWith(`${partialsDirectory}/`);
}

function unique(values: string[]): string[] {
    return Array.from(new Set(values));
}
