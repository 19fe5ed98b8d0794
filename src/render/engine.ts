import * as nunjucks from 'nunjucks';
import { RenderError, RenderFailureKind } from '../error/RenderError';
import { ConfigMapping, Logger } from '../types';
import { isConfigMapping } from '../util/merge';
import { create as createStorage } from '../util/storage';
import { singleLine, toError } from '../util/to-error';

/**
 * The template engine as the dispatcher sees it.
 */
export interface TemplateEngine {
    /** Every template identifier in the template source, sorted, `/`-separated */
    listTemplates: () => Promise<string[]>;
    /**
     * Renders one template with the given environment.
     * @throws {RenderError} On syntax errors, undefined variables and missing templates
     */
    render: (template: string, environment: ConfigMapping) => string;
}

/**
 * Creates a nunjucks-backed engine over a template directory.
 *
 * Output is not HTML-escaped. Printing an undefined name is an error; a
 * variable explicitly set to null renders as an empty string.
 */
export function createTemplateEngine(templatesDirectory: string, params: { logger: Logger }): TemplateEngine {
    const { logger } = params;
    const storage = createStorage({ log: logger.debug });
    const environment = new nunjucks.Environment(
        new nunjucks.FileSystemLoader(templatesDirectory, { noCache: true }),
        { autoescape: false, throwOnUndefined: true }
    );

    const listTemplates = async (): Promise<string[]> => {
        const templates = await storage.listFilesRecursive(templatesDirectory, relativePath =>
            logger.warn(`Skipping symbolic link in templates: ${relativePath}`)
        );
        logger.debug(`Found ${templates.length} templates in ${templatesDirectory}`);
        return templates;
    }

    const render = (template: string, variables: ConfigMapping): string => {
        try {
            return environment.render(template, blankNulls(variables));
        } catch (error) {
            const cause = toError(error);
            const diagnostic = singleLine(cause.message);
            throw new RenderError(classifyFailure(diagnostic), template, diagnostic, undefined, cause);
        }
    }

    return { listTemplates, render };
}

/**
 * Sorts a nunjucks diagnostic into a failure kind.
 *
 * @example
 * ```typescript
 * classifyFailure('template not found: web.yaml'); // 'not_found'
 * classifyFailure('(web.yaml) [Line 1, Column 4]\n  attempted to output null or undefined value'); // 'undefined_variable'
 * classifyFailure('(web.yaml) [Line 1, Column 9]\n  expected variable end'); // 'syntax'
 * ```
 */
export function classifyFailure(diagnostic: string): RenderFailureKind {
    if (/template not found/i.test(diagnostic)) {
        return 'not_found';
    }
    if (/\b(undefined|null)\b/.test(diagnostic)) {
        return 'undefined_variable';
    }
    return 'syntax';
}

/**
 * Copies a mapping with every null replaced by an empty string, so that only
 * names that are missing altogether trip `throwOnUndefined`.
 */
export function blankNulls(mapping: ConfigMapping): ConfigMapping {
    const copy: ConfigMapping = {};
    for (const [key, value] of Object.entries(mapping)) {
        Object.defineProperty(copy, key, {
            value: blankValue(value),
            enumerable: true,
            writable: true,
            configurable: true,
        });
    }
    return copy;
}

function blankValue(value: unknown): unknown {
    if (value === null) return '';
    if (Array.isArray(value)) return value.map(blankValue);
    if (isConfigMapping(value)) return blankNulls(value);
    return value;
}
