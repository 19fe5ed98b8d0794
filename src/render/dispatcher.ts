import * as path from 'path';
import { FileSystemError } from '../error/FileSystemError';
import { RenderError } from '../error/RenderError';
import { ConfigMapping, LevelKey, Logger, StackResult } from '../types';
import { levelName } from '../util/level-key';
import { create as createStorage } from '../util/storage';
import { toError } from '../util/to-error';
import { TemplateEngine } from './engine';

export interface DispatchContext {
    engine: TemplateEngine;
    /** Root of the output tree; each stack writes below `<outputDirectory>/<stack segments>` */
    outputDirectory: string;
    logger: Logger;
}

/**
 * Renders the selected templates of one stack and writes them to its output directory.
 *
 * The first render failure aborts: files written before it are left in place.
 *
 * @param templates Identifiers chosen by selectTemplates, in render order
 * @throws {RenderError} When the engine fails on any template
 */
export async function renderStack(
    stack: LevelKey,
    config: ConfigMapping,
    templates: readonly string[],
    context: DispatchContext
): Promise<StackResult> {
    const { engine, logger } = context;
    const storage = createStorage({ log: logger.debug });
    const stackName = levelName(stack);
    const outputDirectory = path.join(context.outputDirectory, ...stack);
    const written: string[] = [];

    for (const template of templates) {
        let rendered: string;
        try {
            rendered = engine.render(template, config);
        } catch (error) {
            if (error instanceof RenderError) {
                throw error.forStack(stackName);
            }
            throw error;
        }

        const outputPath = path.join(outputDirectory, ...template.split('/'));
        try {
            await storage.createDirectory(path.dirname(outputPath));
        } catch (error) {
            throw FileSystemError.directoryCreationFailed(path.dirname(outputPath), toError(error));
        }
        try {
            await storage.writeFile(outputPath, withTrailingNewline(rendered), 'utf8');
        } catch (error) {
            throw FileSystemError.operationFailed('write rendered template', outputPath, toError(error));
        }

        logger.verbose(`Rendered ${template} for ${stackName}: ${outputPath}`);
        written.push(outputPath);
    }

    return { stack, outputDirectory, written };
}

/**
 * Ends text with exactly one newline: one trailing line terminator the engine
 * kept from the template is dropped before appending.
 */
export function withTrailingNewline(text: string): string {
    return `${text.replace(/\r?\n$/, '')}\n`;
}
