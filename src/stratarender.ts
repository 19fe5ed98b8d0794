import { Command } from 'commander';
import { configure } from './configure';
import { DEFAULT_LOGGER } from './constants';
import { read } from './read';
import { checkConfig, run, RunDependencies } from './run';
import { Args, Logger, RunOptions, Stratarender } from './types';

export * from './types';
export * from './error';
export { DEFAULT_LOGGER, DEFAULT_RUN_OPTIONS, EXIT_CODES, PROGRAM_NAME } from './constants';
export { readLevelTable } from './discovery';
export { mergeMappings, mergeAll, isConfigMapping } from './util/merge';
export { listStacks, collectAncestry, resolveStack, traceStack } from './util/hierarchical';
export type { ConfigTrace, ValueSource } from './util/hierarchical';
export { encodeLevelKey, levelName } from './util/level-key';
export { createTemplateEngine, selectTemplates, renderStack } from './render';
export type { TemplateEngine } from './render';

/**
 * Creates a stratarender instance.
 *
 * @param pOptions.logger - Custom logger implementation (optional, defaults to console logger)
 * @param pOptions.dependencies - Replacement collaborators, such as a template engine
 *
 * @example
 * ```typescript
 * import { Command } from 'commander';
 * import { create } from 'stratarender';
 *
 * const renderer = create({});
 * const program = await renderer.configure(new Command());
 * program.parse(process.argv);
 *
 * const options = await renderer.read(program.opts());
 * await renderer.run(options);
 * ```
 */
export const create = (pOptions: {
    logger?: Logger,
    dependencies?: RunDependencies,
} = {}): Stratarender => {
    let logger = pOptions.logger || DEFAULT_LOGGER;
    const dependencies = pOptions.dependencies || {};

    const setLogger = (pLogger: Logger) => {
        logger = pLogger;
    }

    return {
        setLogger,
        configure: (command: Command) => configure(command),
        read: (args: Args) => read(args, logger),
        run: (options: RunOptions) => run(options, logger, dependencies),
        checkConfig: (options: RunOptions) => checkConfig(options, logger),
    }
}
