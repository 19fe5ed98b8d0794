/**
 * Level Store
 *
 * Scans the variables root breadth-first and builds one merged mapping per
 * directory. Subdirectories become separate levels; only files directly inside
 * a directory are merged into its level.
 *
 * @module discovery/level-store
 */

import * as path from 'path';
import { FileSystemError } from '../error/FileSystemError';
import { ParseError } from '../error/ParseError';
import { StructuralMismatchError } from '../error/StructuralMismatchError';
import { ConfigMapping, Level, LevelKey, LevelTable, Logger, NonMappingPolicy } from '../types';
import { encodeLevelKey, levelName } from '../util/level-key';
import { isConfigMapping, mergeMappings } from '../util/merge';
import { create as createStorage, Entry } from '../util/storage';
import { toError } from '../util/to-error';
import { loadYaml, yamlDiagnostic } from '../util/yaml';

export interface LevelStoreOptions {
    /** File extensions read as variables, including the dot (e.g. '.yaml') */
    dataExtensions: string[];
    encoding: string;
    nonMappingFiles: NonMappingPolicy;
    logger: Logger;
}

/**
 * Reads every directory under `variablesDirectory` into a level table.
 *
 * Entries are visited in sorted order, so files of one directory merge in a
 * fixed order (later file wins) and each directory's parent is recorded
 * before the directory itself.
 *
 * @throws {ParseError} When a file cannot be decoded or parsed, or is not a mapping under the 'error' policy
 * @throws {StructuralMismatchError} When two files of the same directory disagree on a key's structure
 */
export async function readLevelTable(variablesDirectory: string, options: LevelStoreOptions): Promise<LevelTable> {
    const { logger } = options;
    const storage = createStorage({ log: logger.debug });
    const extensions = new Set(options.dataExtensions.map(extension => extension.toLowerCase()));

    const levels = new Map<string, Level>();
    let maxDepth = 0;

    const pending: LevelKey[] = [[]];
    for (let index = 0; index < pending.length; index++) {
        const key = pending[index];
        const directory = path.join(variablesDirectory, ...key);
        logger.debug(`Scanning level ${levelName(key)}: ${directory}`);

        let entries: Entry[];
        try {
            entries = await storage.listEntries(directory);
        } catch (error) {
            throw FileSystemError.operationFailed('list variables directory', directory, toError(error));
        }

        let mapping: ConfigMapping = {};
        const files: string[] = [];

        for (const entry of entries) {
            const entryPath = path.join(directory, entry.name);
            if (entry.isDirectory) {
                pending.push([...key, entry.name]);
                continue;
            }
            if (entry.isSymbolicLink) {
                logger.warn(`Skipping symbolic link: ${entryPath}`);
                continue;
            }
            if (!entry.isFile || !extensions.has(path.extname(entry.name).toLowerCase())) {
                logger.debug(`Skipping non-data entry: ${entryPath}`);
                continue;
            }

            const fileMapping = await readDataFile(entryPath, options);
            if (fileMapping === null) {
                continue;
            }

            try {
                mapping = mergeMappings(mapping, fileMapping);
            } catch (error) {
                if (error instanceof StructuralMismatchError) {
                    throw error.at(entryPath);
                }
                throw error;
            }
            files.push(entryPath);
            logger.debug(`Merged ${entryPath} into level ${levelName(key)}`);
        }

        levels.set(encodeLevelKey(key), { key, mapping, files });
        maxDepth = Math.max(maxDepth, key.length);
    }

    logger.verbose(`Read ${levels.size} levels from ${variablesDirectory} (max depth ${maxDepth})`);
    return { levels, maxDepth };
}

/**
 * Reads and parses one data file.
 *
 * @returns The file's mapping, or null when the file contributes nothing
 */
export async function readDataFile(filePath: string, options: LevelStoreOptions): Promise<ConfigMapping | null> {
    const { logger, encoding } = options;
    const storage = createStorage({ log: logger.debug });

    let buffer: Buffer;
    try {
        buffer = await storage.readBuffer(filePath);
    } catch (error) {
        throw FileSystemError.operationFailed('read variables file', filePath, toError(error));
    }

    let content: string;
    try {
        content = new TextDecoder(encoding, { fatal: true }).decode(buffer);
    } catch (error) {
        throw ParseError.decode(filePath, encoding, toError(error));
    }

    let document: unknown;
    try {
        document = loadYaml(content, filePath);
    } catch (error) {
        const cause = toError(error);
        throw ParseError.syntax(filePath, cause, yamlDiagnostic(cause));
    }

    if (document === null || document === undefined) {
        logger.debug(`Empty variables file: ${filePath}`);
        return null;
    }

    if (isConfigMapping(document)) {
        return document;
    }

    const kind = describeKind(document);
    if (options.nonMappingFiles === 'error') {
        throw ParseError.notMapping(filePath, kind);
    }
    logger.warn(`Ignoring ${filePath}: expected a mapping, found ${kind}`);
    return null;
}

function describeKind(value: unknown): string {
    if (Array.isArray(value)) return 'a list';
    return typeof value === 'object' ? 'an object' : `a ${typeof value}`;
}
