import * as os from 'os';
import * as path from 'path';
import { ArgumentError } from './error/ArgumentError';
import { ConfigurationError } from './error/ConfigurationError';
import { FileSystemError } from './error/FileSystemError';
import { DEFAULT_RUN_OPTIONS } from './constants';
import { Args, ConfigMapping, Logger, RunOptions } from './types';
import { isConfigMapping } from './util/merge';
import * as Storage from './util/storage';
import { toError } from './util/to-error';
import { loadYaml, yamlDiagnostic } from './util/yaml';
import { validateRunOptions } from './validate';

const DIRECTORY_OPTIONS = ['variablesDirectory', 'templatesDirectory', 'outputDirectory'] as const;

/**
 * Removes undefined values so that unset CLI arguments do not override other sources.
 */
function clean(obj: Record<string, unknown>): Record<string, unknown> {
    return Object.fromEntries(
        Object.entries(obj).filter(([_, v]) => v !== undefined)
    );
}

/**
 * Validates a directory path given on the command line or in an options file.
 *
 * @throws {ArgumentError} When the path is empty, contains a null byte, or is too long
 */
export function validateDirectoryArgument(name: string, value: string): string {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
        throw new ArgumentError(name, `${name} cannot be empty or whitespace only`);
    }
    if (trimmed.includes('\0')) {
        throw new ArgumentError(name, `${name} contains invalid null character`);
    }
    if (trimmed.length > 1000) {
        throw new ArgumentError(name, `${name} path is too long (max 1000 characters)`);
    }
    return trimmed;
}

/**
 * Expands a leading `~` to the user's home directory.
 */
export function expandHome(directory: string): string {
    if (directory === '~') {
        return os.homedir();
    }
    if (directory.startsWith('~/')) {
        return path.join(os.homedir(), directory.slice(2));
    }
    return directory;
}

/**
 * Maps CLI arguments onto run option names.
 */
function argsToOptions(args: Args): Record<string, unknown> {
    return clean({
        variablesDirectory: args.variables,
        templatesDirectory: args.templates,
        outputDirectory: args.output,
        templateExtension: args.extension,
        partialsDirectory: args.partials,
        nonMappingFiles: args.strictMapping ? 'error' : undefined,
    });
}

/**
 * Loads an options file. Its keys use run option names (variablesDirectory, encoding, ...).
 *
 * @throws {FileSystemError} When the file does not exist or cannot be read
 * @throws {ConfigurationError} When the file is not valid YAML or not a mapping
 */
export const loadOptionsFile = async (configFile: string, logger: Logger): Promise<ConfigMapping> => {
    const storage = Storage.create({ log: logger.debug });
    if (!await storage.isFileReadable(configFile)) {
        throw FileSystemError.fileNotFound(configFile);
    }

    let content: string;
    try {
        content = await storage.readFile(configFile, 'utf8');
    } catch (error) {
        throw FileSystemError.operationFailed('read options file', configFile, toError(error));
    }

    let parsed: unknown;
    try {
        parsed = loadYaml(content, configFile);
    } catch (error) {
        throw ConfigurationError.validation(
            `Unable to parse options file ${configFile}: ${yamlDiagnostic(toError(error))}`,
            undefined,
            configFile
        );
    }

    if (parsed === null || parsed === undefined) {
        logger.verbose(`Options file ${configFile} is empty`);
        return {};
    }
    if (!isConfigMapping(parsed)) {
        throw ConfigurationError.validation(`Options file ${configFile} must contain a mapping`, undefined, configFile);
    }

    logger.verbose(`Loaded options file ${configFile}`);
    return parsed;
}

/**
 * Resolves run options from, in increasing precedence: defaults, the options
 * file named by `--config`, and the remaining CLI arguments.
 *
 * Directories have `~` expanded and, when `--base` is given, relative
 * directories are resolved against it.
 *
 * @example
 * ```typescript
 * const options = await read({ base: '~/deploy', output: 'rendered' }, logger);
 * // options.variablesDirectory === '/home/me/deploy/vars'
 * // options.outputDirectory === '/home/me/deploy/rendered'
 * ```
 */
export const read = async (args: Args, logger: Logger): Promise<RunOptions> => {
    const fileOptions = args.config
        ? await loadOptionsFile(expandHome(validateDirectoryArgument('config', args.config)), logger)
        : {};

    const merged: Record<string, unknown> = {
        ...DEFAULT_RUN_OPTIONS,
        ...fileOptions,
        ...argsToOptions(args),
    };

    const base = args.base === undefined
        ? undefined
        : expandHome(validateDirectoryArgument('base', args.base));

    for (const key of DIRECTORY_OPTIONS) {
        const value = merged[key];
        if (typeof value !== 'string') {
            continue;
        }
        const directory = expandHome(validateDirectoryArgument(key, value));
        merged[key] = base !== undefined && !path.isAbsolute(directory)
            ? path.join(base, directory)
            : directory;
    }

    const options = validateRunOptions(merged, args.config);
    logger.debug(`Resolved run options: ${JSON.stringify(options)}`);
    return options;
}
