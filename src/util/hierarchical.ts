import { ConfigurationError } from '../error/ConfigurationError';
import { StructuralMismatchError } from '../error/StructuralMismatchError';
import { ConfigMapping, Level, LevelKey, LevelTable } from '../types';
import { ancestry, compareLevelKeys, encodeLevelKey, levelName } from './level-key';
import { isConfigMapping, mergeAll } from './merge';

/**
 * Where a single resolved value came from.
 */
export interface ValueSource {
    value: unknown;
    /** Name of the level that supplied the value ('<root>' or 'prod/app') */
    level: string;
    /** Depth of that level; deeper levels win */
    depth: number;
}

/**
 * Resolved values of a stack keyed by dotted value path.
 */
export type ConfigTrace = Record<string, ValueSource>;

/**
 * Lists every stack: the levels at the maximum depth, in sorted order.
 * When the variables root has no subdirectories the root itself is the only stack.
 */
export function listStacks(table: LevelTable): LevelKey[] {
    return Array.from(table.levels.values())
        .filter(level => level.key.length === table.maxDepth)
        .map(level => level.key)
        .sort(compareLevelKeys);
}

/**
 * Collects a stack's levels ordered from the root down to the stack itself.
 *
 * The table is walked from the stack upwards; the walked list is reversed
 * so that callers can fold it with later (deeper) levels overriding earlier ones.
 *
 * @throws {ConfigurationError} When an ancestor is missing from the table
 */
export function collectAncestry(table: LevelTable, stack: LevelKey): Level[] {
    const walked: Level[] = [];
    for (const key of ancestry(stack)) {
        const level = table.levels.get(encodeLevelKey(key));
        if (!level) {
            throw ConfigurationError.missingLevel(levelName(key), levelName(stack));
        }
        walked.push(level);
    }
    return walked.reverse();
}

/**
 * Cascades a stack's ancestry into its resolved configuration.
 * Deeper levels override shallower ones; the stack's own level wins every conflict.
 *
 * @example
 * ```typescript
 * // <root>: { x: 1 }, a: { x: 2, y: 1 }, a/b: { y: 2 }
 * resolveStack(table, ['a', 'b']); // { x: 2, y: 2 }
 * ```
 */
export function resolveStack(table: LevelTable, stack: LevelKey): ConfigMapping {
    const levels = collectAncestry(table, stack);
    try {
        return mergeAll(levels.map(level => level.mapping));
    } catch (error) {
        if (error instanceof StructuralMismatchError) {
            throw error.at(`stack ${levelName(stack)}`);
        }
        throw error;
    }
}

/**
 * Records, for every leaf value of a stack's resolved configuration, the level it came from.
 * Mirrors resolveStack: a deeper level's value replaces a shallower one. Empty
 * mappings hold no leaf values and do not appear.
 */
export function traceStack(table: LevelTable, stack: LevelKey): ConfigTrace {
    const trace: ConfigTrace = {};
    for (const level of collectAncestry(table, stack)) {
        trackSources(level.mapping, levelName(level.key), level.key.length, '', trace);
    }
    return trace;
}

function trackSources(
    value: unknown,
    level: string,
    depth: number,
    prefix: string,
    trace: ConfigTrace
): void {
    if (!isConfigMapping(value)) {
        trace[prefix] = { value, level, depth };
        return;
    }

    for (const [key, nested] of Object.entries(value)) {
        trackSources(nested, level, depth, prefix ? `${prefix}.${key}` : key, trace);
    }
}
