import * as yaml from 'js-yaml';

/**
 * YAML schema for variables and options files.
 *
 * The core schema plus merge keys (`<<`). Unquoted dates stay strings, so a
 * value such as `2020-01-01` renders as written on every machine.
 */
export const DATA_SCHEMA = yaml.CORE_SCHEMA.extend({ implicit: [yaml.types.merge] });

/**
 * Parses a YAML document with DATA_SCHEMA.
 *
 * @throws {yaml.YAMLException} On syntax errors
 */
export function loadYaml(content: string, filename: string): unknown {
    return yaml.load(content, { filename, schema: DATA_SCHEMA });
}

/**
 * One-line form of a parser error: the reason and its position, without the source snippet.
 *
 * @example
 * ```typescript
 * yamlDiagnostic(error); // 'unexpected end of the stream within a flow collection (2:1)'
 * ```
 */
export function yamlDiagnostic(error: Error): string {
    if (error instanceof yaml.YAMLException) {
        return `${error.reason} (${error.mark.line + 1}:${error.mark.column + 1})`;
    }
    return error.message;
}
