import { ConfigurationError, formatIssues } from "./error/ConfigurationError";
import { ConfigMapping, RunOptions, RunOptionsSchema, StackDirectives, StackDirectivesSchema } from "./types";

/**
 * Validates merged run options against the schema.
 *
 * Unknown keys are rejected so that a misspelled option in an options file
 * does not silently fall back to its default.
 *
 * @param options - Defaults, options file and CLI arguments, already merged
 * @param configPath - Options file the values came from, for error messages
 * @throws {ConfigurationError} When a value is missing, has the wrong type, or is unknown
 */
export const validateRunOptions = (options: Record<string, unknown>, configPath?: string): RunOptions => {
    const result = RunOptionsSchema.strict().safeParse(options);
    if (!result.success) {
        const source = configPath ? ` (from ${configPath})` : '';
        throw ConfigurationError.validation(
            `Invalid run options${source}: ${formatIssues(result.error)}`,
            result.error,
            configPath
        );
    }
    return result.data;
}

/**
 * Extracts the template directives (`templates`, `exclude`) of a stack's resolved configuration.
 * Other keys are template variables and are not inspected.
 *
 * @throws {ConfigurationError} When either key is present but is not a list of names
 */
export const readStackDirectives = (config: ConfigMapping, stackName: string): StackDirectives => {
    const result = StackDirectivesSchema.safeParse(config);
    if (!result.success) {
        throw ConfigurationError.directive(stackName, result.error);
    }
    return result.data;
}
