import { Command, CommanderError } from 'commander';
import { DEFAULT_LOGGER, EXIT_CODES, ExitCode, PROGRAM_NAME, VERSION } from './constants';
import { ArgumentError } from './error/ArgumentError';
import { ConfigurationError } from './error/ConfigurationError';
import { FileSystemError } from './error/FileSystemError';
import { ParseError } from './error/ParseError';
import { RenderError } from './error/RenderError';
import { StructuralMismatchError } from './error/StructuralMismatchError';
import { create } from './stratarender';
import { Args, Logger } from './types';
import { singleLine } from './util/to-error';

/**
 * Console logger whose debug and verbose output is switched on by --debug and --verbose.
 */
export const createCliLogger = (args: Pick<Args, 'verbose' | 'debug'>): Logger => ({
    ...DEFAULT_LOGGER,
    debug: args.debug ? DEFAULT_LOGGER.debug : () => { },
    verbose: args.verbose || args.debug ? DEFAULT_LOGGER.info : () => { },
});

/**
 * Maps a failure to the process exit code.
 */
export const exitCodeFor = (error: unknown): ExitCode => {
    if (error instanceof RenderError) {
        return EXIT_CODES.RENDER_FAILED;
    }
    if (error instanceof FileSystemError) {
        if (error.isMissingInput('variables')) return EXIT_CODES.VARIABLES_NOT_FOUND;
        if (error.isMissingInput('templates')) return EXIT_CODES.TEMPLATES_NOT_FOUND;
        if (error.operation === 'file_read') return EXIT_CODES.CONFIGURATION_INVALID;
        return EXIT_CODES.UNEXPECTED_FAILURE;
    }
    if (error instanceof ParseError ||
        error instanceof StructuralMismatchError ||
        error instanceof ConfigurationError ||
        error instanceof ArgumentError) {
        return EXIT_CODES.CONFIGURATION_INVALID;
    }
    return EXIT_CODES.UNEXPECTED_FAILURE;
}

/**
 * The single diagnostic line printed for a failure.
 */
export const describeFailure = (error: unknown): string => singleLine(failureText(error));

const failureText = (error: unknown): string => {
    if (error instanceof RenderError) {
        return `Failed to render: ${error.message}`;
    }
    if (error instanceof FileSystemError && error.errorType === 'not_found') {
        return error.operation === 'file_read' ? `${error.message}: "${error.path}"` : error.message;
    }
    if (error instanceof Error) {
        return `${error.name}: ${error.message}`;
    }
    return `Unexpected failure: ${String(error)}`;
}

/**
 * Runs the command line and returns the exit code instead of exiting.
 *
 * @param argv - Arguments without the node executable and script name
 * @param logger - Replaces the console logger, mostly for tests
 */
export const main = async (argv: string[], logger?: Logger): Promise<ExitCode> => {
    const program = new Command()
        .name(PROGRAM_NAME)
        .description('Render templates once per stack from layered YAML variables')
        .version(VERSION)
        .exitOverride();

    const renderer = create({ logger: logger ?? DEFAULT_LOGGER });
    await renderer.configure(program);

    try {
        program.parse(argv, { from: 'user' });
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.CONFIGURATION_INVALID;
        }
        (logger ?? DEFAULT_LOGGER).error(describeFailure(error));
        return exitCodeFor(error);
    }

    const args = program.opts<Args>();
    const activeLogger = logger ?? createCliLogger(args);
    renderer.setLogger(activeLogger);

    try {
        const options = await renderer.read(args);
        if (args.checkConfig) {
            await renderer.checkConfig(options);
        } else {
            await renderer.run(options);
        }
        return EXIT_CODES.SUCCESS;
    } catch (error) {
        activeLogger.error(describeFailure(error));
        return exitCodeFor(error);
    }
}
