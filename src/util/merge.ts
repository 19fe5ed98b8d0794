import { StructuralMismatchError } from '../error/StructuralMismatchError';
import { ConfigMapping } from '../types';

/**
 * Type guard for configuration mappings: plain objects only.
 * Arrays, dates and other class instances are values, not mappings.
 */
export const isConfigMapping = (value: unknown): value is ConfigMapping => {
    if (value === null || typeof value !== 'object' || Array.isArray(value)) {
        return false;
    }
    const prototype = Object.getPrototypeOf(value);
    return prototype === Object.prototype || prototype === null;
};

/**
 * Deep merges two mappings; `override` wins on conflicting values.
 *
 * - keys present in one input only are copied as-is
 * - mappings on both sides are merged recursively
 * - scalars and lists on both sides: the override replaces the base wholesale
 * - a mapping on one side and anything else on the other throws StructuralMismatchError
 *
 * Neither input is modified.
 *
 * @example
 * ```typescript
 * mergeMappings({ api: { timeout: 5 }, tags: ['a'] }, { api: { retries: 3 }, tags: ['b'] });
 * // { api: { timeout: 5, retries: 3 }, tags: ['b'] }
 * ```
 */
export function mergeMappings(base: ConfigMapping, override: ConfigMapping): ConfigMapping {
    return mergeAt(base, override, []);
}

/**
 * Folds mappings from lowest to highest precedence: later mappings win.
 *
 * @param mappings Mappings ordered from lowest to highest precedence
 */
export function mergeAll(mappings: readonly ConfigMapping[]): ConfigMapping {
    return mappings.reduce<ConfigMapping>((merged, current) => mergeMappings(merged, current), {});
}

function mergeAt(base: ConfigMapping, override: ConfigMapping, keyPath: string[]): ConfigMapping {
    const result: ConfigMapping = {};
    for (const key of Object.keys(base)) {
        assign(result, key, base[key]);
    }

    for (const key of Object.keys(override)) {
        const overrideValue = override[key];
        if (!Object.prototype.hasOwnProperty.call(result, key)) {
            assign(result, key, overrideValue);
            continue;
        }

        const baseValue = result[key];
        const baseIsMapping = isConfigMapping(baseValue);
        const overrideIsMapping = isConfigMapping(overrideValue);

        if (baseIsMapping && overrideIsMapping) {
            assign(result, key, mergeAt(baseValue, overrideValue, [...keyPath, key]));
        } else if (baseIsMapping || overrideIsMapping) {
            throw new StructuralMismatchError([...keyPath, key], baseValue, overrideValue);
        } else {
            assign(result, key, overrideValue);
        }
    }

    return result;
}

// Keys such as "__proto__" must stay plain data properties.
function assign(target: ConfigMapping, key: string, value: unknown): void {
    Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}
