import { Command } from "commander";
import { z } from "zod";

/**
 * A nested key-value structure read from a data file.
 * Values are scalars, lists or further mappings; only plain objects count as mappings.
 */
export type ConfigMapping = Record<string, unknown>;

/**
 * Ordered directory segments locating a level below the variables root.
 * The empty key is the root itself.
 */
export type LevelKey = readonly string[];

/**
 * The merged configuration of a single directory, before cascading with its ancestors.
 */
export interface Level {
    /** Segments of the directory relative to the variables root */
    key: LevelKey;
    /** Merge of every data file directly inside the directory */
    mapping: ConfigMapping;
    /** Absolute paths of the files that contributed to the mapping, in merge order */
    files: string[];
}

/**
 * Every directory found under the variables root, keyed by its encoded level key.
 */
export interface LevelTable {
    levels: Map<string, Level>;
    /** Length of the longest level key recorded */
    maxDepth: number;
}

/**
 * What to do with a data file whose document is not a mapping (a bare list or scalar).
 * - 'ignore': drop it from the merge and log a warning
 * - 'error': abort with a ParseError
 */
export type NonMappingPolicy = 'ignore' | 'error';

/**
 * Logger interface used throughout stratarender.
 * Compatible with popular logging libraries like Winston, Bunyan, etc.
 */
export interface Logger {
    /** Debug-level logging for detailed troubleshooting information */
    debug: (message: string, ...args: unknown[]) => void;
    /** Info-level logging for general information */
    info: (message: string, ...args: unknown[]) => void;
    /** Warning-level logging for non-critical issues */
    warn: (message: string, ...args: unknown[]) => void;
    /** Error-level logging for critical problems */
    error: (message: string, ...args: unknown[]) => void;
    /** Verbose-level logging for extensive detail */
    verbose: (message: string, ...args: unknown[]) => void;
    /** Silly-level logging for maximum detail */
    silly: (message: string, ...args: unknown[]) => void;
}

/**
 * Options controlling a render run.
 */
export const RunOptionsSchema = z.object({
    /** Root of the layered variables directories */
    variablesDirectory: z.string().min(1),
    /** Root of the template source */
    templatesDirectory: z.string().min(1),
    /** Root of the rendered output tree */
    outputDirectory: z.string().min(1),
    /** Extension appended to names listed under `templates` and `exclude` */
    templateExtension: z.string(),
    /** Top-level template directory holding includable fragments that are never rendered directly */
    partialsDirectory: z.string().min(1).refine(value => !value.includes('/'), {
        message: 'Partials directory must be a single path segment',
    }),
    nonMappingFiles: z.enum(['ignore', 'error']),
    /** Extensions of the files read as variables */
    dataExtensions: z.array(z.string().min(1)).min(1),
    /** Encoding used to decode variables files */
    encoding: z.string().refine(isSupportedEncoding, {
        message: 'Unsupported encoding',
    }),
});

export type RunOptions = z.infer<typeof RunOptionsSchema>;

/**
 * Recognized keys of a resolved stack configuration.
 * Names may be written as numbers in YAML; they are used as strings.
 */
export const StackDirectivesSchema = z.object({
    templates: z.array(z.union([z.string(), z.number()]).transform(String)).optional(),
    exclude: z.array(z.union([z.string(), z.number()]).transform(String)).optional(),
});

export type StackDirectives = z.infer<typeof StackDirectivesSchema>;

/**
 * Parsed command-line arguments, as returned by Commander's opts().
 */
export type Args = {
    base?: string;
    variables?: string;
    templates?: string;
    output?: string;
    extension?: string;
    partials?: string;
    strictMapping?: boolean;
    config?: string;
    checkConfig?: boolean;
    verbose?: boolean;
    debug?: boolean;
};

/**
 * Outcome of rendering one stack.
 */
export interface StackResult {
    stack: LevelKey;
    /** Directory the stack's templates were written to */
    outputDirectory: string;
    /** Absolute paths of the files written, in render order */
    written: string[];
}

export interface RunResult {
    maxDepth: number;
    stacks: StackResult[];
}

/**
 * Main stratarender interface, tying option parsing to the render pipeline.
 */
export interface Stratarender {
    /** Adds stratarender's options to a Commander.js command */
    configure: (command: Command) => Promise<Command>;
    /** Sets a custom logger for debugging and error reporting */
    setLogger: (logger: Logger) => void;
    /** Resolves run options from defaults, an optional options file and CLI arguments */
    read: (args: Args) => Promise<RunOptions>;
    /** Renders every selected template for every stack */
    run: (options: RunOptions) => Promise<RunResult>;
    /** Logs each stack's resolved configuration along with where every value came from */
    checkConfig: (options: RunOptions) => Promise<void>;
}

function isSupportedEncoding(encoding: string): boolean {
    try {
        new TextDecoder(encoding);
        return true;
    } catch {
        return false;
    }
}
