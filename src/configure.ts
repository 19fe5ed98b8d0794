import { Command } from "commander";
import { ArgumentError } from "./error/ArgumentError";
import { DEFAULT_RUN_OPTIONS } from "./constants";
import { validateDirectoryArgument } from "./read";
export { ArgumentError };

/**
 * Wraps a path validator so that CLI errors name the flag.
 */
const directoryParser = (flag: string) => (value: string): string => {
    try {
        return validateDirectoryArgument(flag, value);
    } catch (error) {
        if (error instanceof ArgumentError) {
            throw new ArgumentError(flag, `Invalid --${flag}: ${error.message}`);
        }
        throw error;
    }
}

/**
 * Configures a Commander.js command with stratarender's options.
 *
 * No option carries a Commander default: unset options stay undefined so that
 * values from an options file are not overridden. Defaults are applied in read().
 *
 * @throws {ArgumentError} When command is not a Commander.js Command
 *
 * @example
 * ```typescript
 * const program = await configure(new Command());
 * program.parse(process.argv);
 * const options = await read(program.opts(), logger);
 * ```
 */
export const configure = async (command: Command): Promise<Command> => {
    if (!command) {
        throw new ArgumentError('command', 'Command instance is required');
    }

    if (typeof command.option !== 'function') {
        throw new ArgumentError('command', 'Command must be a valid Commander.js Command instance');
    }

    return command
        .option('-b, --base <directory>', 'Base directory for relative input and output directories', directoryParser('base'))
        .option('-v, --variables <directory>', `Variables directory (default: "${DEFAULT_RUN_OPTIONS.variablesDirectory}")`, directoryParser('variables'))
        .option('-p, --templates <directory>', `Templates directory (default: "${DEFAULT_RUN_OPTIONS.templatesDirectory}")`, directoryParser('templates'))
        .option('-o, --output <directory>', `Output directory (default: "${DEFAULT_RUN_OPTIONS.outputDirectory}")`, directoryParser('output'))
        .option('-e, --extension <extension>', `Extension of templates named in templates/exclude (default: "${DEFAULT_RUN_OPTIONS.templateExtension}")`)
        .option('--partials <name>', `Template directory that is never rendered directly (default: "${DEFAULT_RUN_OPTIONS.partialsDirectory}")`)
        .option('--strict-mapping', 'Fail on variables files that do not contain a mapping')
        .option('-c, --config <file>', 'YAML options file')
        .option('--check-config', 'Display each stack\'s resolved variables with their sources and exit')
        .option('--verbose', 'Log each stack and rendered file')
        .option('--debug', 'Log every directory and file read');
}
