import { LevelKey } from '../types';
import { compareNames } from './storage';

/** Display name of the empty key */
export const ROOT_LEVEL_NAME = '<root>';

/**
 * Encodes a level key for use as a map key. Segments are directory names and never contain '/'.
 */
export const encodeLevelKey = (key: LevelKey): string => key.join('/');

/**
 * Human-readable name of a level, used in logs and error messages.
 */
export const levelName = (key: LevelKey): string => key.length === 0 ? ROOT_LEVEL_NAME : key.join('/');

/**
 * Lists a key and all of its ancestors, from the key itself up to the root.
 *
 * @example
 * ```typescript
 * ancestry(['prod', 'app']); // [['prod', 'app'], ['prod'], []]
 * ```
 */
export function ancestry(key: LevelKey): LevelKey[] {
    const keys: LevelKey[] = [];
    for (let length = key.length; length >= 0; length--) {
        keys.push(key.slice(0, length));
    }
    return keys;
}

/**
 * Orders keys segment by segment; a key sorts before its own descendants.
 */
export function compareLevelKeys(a: LevelKey, b: LevelKey): number {
    const shared = Math.min(a.length, b.length);
    for (let index = 0; index < shared; index++) {
        const order = compareNames(a[index], b[index]);
        if (order !== 0) {
            return order;
        }
    }
    return a.length - b.length;
}
