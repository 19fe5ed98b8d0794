import { readLevelTable } from './discovery/level-store';
import { FileSystemError } from './error/FileSystemError';
import { createTemplateEngine, TemplateEngine } from './render/engine';
import { renderStack } from './render/dispatcher';
import { selectTemplates } from './render/selector';
import { LevelTable, Logger, RunOptions, RunResult, StackResult } from './types';
import { listStacks, resolveStack, traceStack, ValueSource } from './util/hierarchical';
import { levelName } from './util/level-key';
import { create as createStorage } from './util/storage';
import { readStackDirectives } from './validate';

/**
 * Collaborators a run can be given instead of the defaults.
 */
export interface RunDependencies {
    engine?: TemplateEngine;
}

/**
 * Checks that both input roots exist, templates first.
 *
 * @throws {FileSystemError} When the template source or the variables root is missing
 */
export const checkInputDirectories = async (options: RunOptions, logger: Logger): Promise<void> => {
    const storage = createStorage({ log: logger.debug });
    if (!await storage.isDirectoryReadable(options.templatesDirectory)) {
        throw FileSystemError.inputDirectoryNotFound('templates', options.templatesDirectory);
    }
    if (!await storage.isDirectoryReadable(options.variablesDirectory)) {
        throw FileSystemError.inputDirectoryNotFound('variables', options.variablesDirectory);
    }
}

const loadLevels = async (options: RunOptions, logger: Logger): Promise<LevelTable> => {
    return await readLevelTable(options.variablesDirectory, {
        dataExtensions: options.dataExtensions,
        encoding: options.encoding,
        nonMappingFiles: options.nonMappingFiles,
        logger,
    });
}

/**
 * Renders every stack found under the variables root.
 *
 * Stacks are processed one at a time in sorted order. The first fatal error
 * (parse, structure, directive or render failure) stops the run; output
 * written for earlier stacks is kept.
 *
 * @example
 * ```typescript
 * const result = await run({ ...DEFAULT_RUN_OPTIONS, variablesDirectory: './vars' }, DEFAULT_LOGGER);
 * result.stacks.forEach(stack => console.log(stack.outputDirectory, stack.written.length));
 * ```
 */
export const run = async (options: RunOptions, logger: Logger, dependencies: RunDependencies = {}): Promise<RunResult> => {
    await checkInputDirectories(options, logger);

    const table = await loadLevels(options, logger);
    const stacks = listStacks(table);
    const engine = dependencies.engine ?? createTemplateEngine(options.templatesDirectory, { logger });
    const available = await engine.listTemplates();

    logger.verbose(`Rendering ${stacks.length} stacks with ${available.length} available templates`);

    const results: StackResult[] = [];
    for (const stack of stacks) {
        const stackName = levelName(stack);
        const config = resolveStack(table, stack);
        const directives = readStackDirectives(config, stackName);
        const templates = selectTemplates(directives, available, options);
        logger.verbose(`Stack ${stackName}: ${templates.length} templates selected`);

        results.push(await renderStack(stack, config, templates, {
            engine,
            outputDirectory: options.outputDirectory,
            logger,
        }));
    }

    const fileCount = results.reduce((total, result) => total + result.written.length, 0);
    logger.info(`Rendered ${fileCount} files for ${results.length} stacks into ${options.outputDirectory}`);

    return { maxDepth: table.maxDepth, stacks: results };
}

/**
 * Formats a resolved value for display.
 */
export function formatConfigValue(value: unknown): string {
    if (value === null) return 'null';
    if (value === undefined) return 'undefined';
    if (typeof value === 'string') return `"${value}"`;
    if (value instanceof Date) return value.toISOString();
    if (Array.isArray(value)) {
        if (value.length === 0) return '[]';
        if (value.length <= 3) {
            return `[${value.map(formatConfigValue).join(', ')}]`;
        }
        return `[${value.slice(0, 2).map(formatConfigValue).join(', ')}, ... (${value.length} items)]`;
    }
    if (typeof value === 'object') {
        return Object.keys(value).length === 0 ? '{}' : JSON.stringify(value);
    }
    return String(value);
}

/**
 * Logs each stack's resolved configuration, one value per line, with the level that supplied it.
 *
 * ```text
 * STACK prod/app
 * [prod/app] name: "x"
 * [prod    ] env : "p"
 * ```
 *
 * Nothing is rendered or written.
 */
export const checkConfig = async (options: RunOptions, logger: Logger): Promise<void> => {
    await checkInputDirectories(options, logger);
    const table = await loadLevels(options, logger);
    const stacks = listStacks(table);

    logger.info('='.repeat(80));
    logger.info(`RESOLVED CONFIGURATION (${stacks.length} stacks, depth ${table.maxDepth})`);
    logger.info('='.repeat(80));

    for (const stack of stacks) {
        // Resolving first surfaces structural conflicts the trace would not report.
        resolveStack(table, stack);
        const trace = traceStack(table, stack);
        logger.info(`STACK ${levelName(stack)}`);
        for (const line of formatTrace(trace)) {
            logger.info(line);
        }
    }
}

/**
 * One line per value path, deepest sources first and then by path.
 */
export function formatTrace(trace: Record<string, ValueSource>): string[] {
    const entries = Object.entries(trace).sort(([keyA, a], [keyB, b]) =>
        b.depth - a.depth || (keyA < keyB ? -1 : keyA > keyB ? 1 : 0)
    );
    if (entries.length === 0) {
        return ['  (no values)'];
    }
    const keyWidth = Math.max(...entries.map(([key]) => key.length));
    const levelWidth = Math.max(...entries.map(([, source]) => source.level.length));
    return entries.map(([key, source]) =>
        `[${source.level.padEnd(levelWidth)}] ${key.padEnd(keyWidth)}: ${formatConfigValue(source.value)}`
    );
}
