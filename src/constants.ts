import { Logger, RunOptions } from "./types";

/** The program name used in CLI help and error messages */
export const PROGRAM_NAME = 'stratarender';

export const VERSION = '0.1.0';

/** Default file encoding for reading variables files */
export const DEFAULT_ENCODING = 'utf8';

/**
 * Default run options, used for anything neither the options file nor the CLI sets.
 * Directories are relative to the working directory (or to --base when given).
 */
export const DEFAULT_RUN_OPTIONS: RunOptions = {
    variablesDirectory: 'vars',
    templatesDirectory: 'templates',
    outputDirectory: 'output',
    templateExtension: '.yaml',
    partialsDirectory: 'partials',
    nonMappingFiles: 'ignore',
    dataExtensions: ['.yaml', '.yml', '.json'],
    encoding: DEFAULT_ENCODING,
};

/**
 * Process exit codes reported by the CLI.
 */
export const EXIT_CODES = {
    SUCCESS: 0,
    RENDER_FAILED: 1,
    VARIABLES_NOT_FOUND: 2,
    TEMPLATES_NOT_FOUND: 3,
    CONFIGURATION_INVALID: 4,
    UNEXPECTED_FAILURE: 5,
} as const;

export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES];

/**
 * Default logger implementation using console methods.
 * The verbose and silly methods are no-ops to avoid excessive output.
 */
export const DEFAULT_LOGGER: Logger = {
    // eslint-disable-next-line no-console
    debug: console.debug,
    // eslint-disable-next-line no-console
    info: console.info,
    // eslint-disable-next-line no-console
    warn: console.warn,
    // eslint-disable-next-line no-console
    error: console.error,

    verbose: () => { },

    silly: () => { },
}
