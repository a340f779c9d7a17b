import { TaterError } from './errors';
import type { MessageFunction, MessageTree, MessageValue } from './types';

/**
 * Unsafe keys that could lead to prototype pollution.
 * They are skipped when a source is merged and never matched by a lookup.
 */
export const UNSAFE_KEYS: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

/** Key of the `{ $fn: name }` reference used by message files */
export const FUNCTION_REFERENCE_KEY = '$fn';

/** Separator between the segments of a key path */
export const SEPARATOR = '.';

export function isMessageTree(value: MessageValue | undefined): value is MessageTree {
    return typeof value === 'object' && !Array.isArray(value);
}

export function isMessageList(value: MessageValue | undefined): value is readonly MessageValue[] {
    return Array.isArray(value);
}

export function isMessageFunction(value: unknown): value is MessageFunction {
    return typeof value === 'function';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null) return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/**
 * Turn a raw source (parsed YAML/JSON, or a caller's object) into a message tree.
 *
 * - `Map` keys are stringified, all the way down
 * - numbers, booleans and bigints become strings
 * - `null`/`undefined` entries are dropped
 * - `{ $fn: 'name' }` is replaced by the registered function of that name
 *
 * @param source - Top-level mapping to convert
 * @param functions - Functions that `$fn` references may name
 * @throws {TaterError} For an unknown function name or an unsupported value
 */
export function normalizeMessages(
    source: unknown,
    functions: Readonly<Record<string, MessageFunction>> = {}
): MessageTree {
    const value = normalizeValue(source, functions, []);
    if (!isMessageTree(value)) {
        throw new TaterError(`[tater] load: messages must be a mapping, got ${describe(source)}`);
    }
    return value;
}

function normalizeValue(
    value: unknown,
    functions: Readonly<Record<string, MessageFunction>>,
    path: string[]
): MessageValue | undefined {
    if (value === null || value === undefined) return undefined;

    switch (typeof value) {
        case 'string':
            return value;
        case 'number':
        case 'boolean':
        case 'bigint':
            return String(value);
        case 'function':
            if (isMessageFunction(value)) return value;
            break;
    }

    if (Array.isArray(value)) {
        const list: MessageValue[] = [];
        value.forEach((item: unknown, index) => {
            const normalized = normalizeValue(item, functions, [...path, String(index)]);
            if (normalized !== undefined) list.push(normalized);
        });
        return list;
    }

    if (value instanceof Map) {
        const entries: [string, unknown][] = [];
        for (const [key, item] of value) {
            entries.push([String(key), item]);
        }
        return normalizeEntries(entries, functions, path);
    }

    if (isPlainObject(value)) {
        const keys = Object.keys(value);
        if (keys.length === 1 && keys[0] === FUNCTION_REFERENCE_KEY) {
            return resolveFunction(value[FUNCTION_REFERENCE_KEY], functions, path);
        }
        return normalizeEntries(Object.entries(value), functions, path);
    }

    throw new TaterError(
        `[tater] load: unsupported message value at '${path.join(SEPARATOR)}': ${describe(value)}`
    );
}

function normalizeEntries(
    entries: [string, unknown][],
    functions: Readonly<Record<string, MessageFunction>>,
    path: string[]
): MessageTree {
    const tree: Record<string, MessageValue> = {};
    for (const [key, item] of entries) {
        if (UNSAFE_KEYS.has(key)) {
            console.warn(`[tater] load: skipping unsafe key '${[...path, key].join(SEPARATOR)}'.`);
            continue;
        }
        const normalized = normalizeValue(item, functions, [...path, key]);
        if (normalized !== undefined) tree[key] = normalized;
    }
    return tree;
}

function resolveFunction(
    name: unknown,
    functions: Readonly<Record<string, MessageFunction>>,
    path: string[]
): MessageFunction {
    const where = path.join(SEPARATOR);
    if (typeof name !== 'string') {
        throw new TaterError(`[tater] load: ${FUNCTION_REFERENCE_KEY} at '${where}' must name a function`);
    }
    if (!Object.hasOwn(functions, name)) {
        throw new TaterError(
            `[tater] load: unknown message function '${name}' at '${where}'. ` +
            `Register it with the 'functions' option or registerFunction().`
        );
    }
    return functions[name];
}

function describe(value: unknown): string {
    if (value === null) return 'null';
    if (typeof value !== 'object') return typeof value;
    return Object.prototype.toString.call(value).slice(8, -1);
}

/**
 * Merge all the way down, returning a new tree.
 * When both sides hold a mapping at a key they are merged; otherwise the
 * value from `from` wins. Neither argument is modified.
 */
export function deepMerge(to: MessageTree, from: MessageTree): MessageTree {
    const merged: Record<string, MessageValue> = { ...to };
    for (const [key, right] of Object.entries(from)) {
        const left = Object.hasOwn(merged, key) ? merged[key] : undefined;
        merged[key] = isMessageTree(left) && isMessageTree(right) ? deepMerge(left, right) : right;
    }
    return merged;
}

/**
 * Freeze all the way down. Functions are left as they are.
 */
export function deepFreeze(tree: MessageTree): MessageTree {
    freezeValue(tree);
    return tree;
}

function freezeValue(value: MessageValue): void {
    if (isMessageList(value)) {
        value.forEach(freezeValue);
        Object.freeze(value);
    } else if (isMessageTree(value)) {
        Object.values(value).forEach(freezeValue);
        Object.freeze(value);
    }
}

/**
 * Walk a key path through a message tree.
 * Only own keys match; a numeric segment indexes into a list.
 *
 * @example dig({ a: { b: 'hello' } }, ['a', 'b']) // => 'hello'
 * @returns The value at the path, or undefined if any segment is missing
 */
export function dig(tree: MessageValue | undefined, path: readonly string[]): MessageValue | undefined {
    let node = tree;
    for (const segment of path) {
        if (node === undefined || UNSAFE_KEYS.has(segment)) return undefined;

        if (isMessageList(node)) {
            node = /^\d+$/.test(segment) ? node[Number(segment)] : undefined;
        } else if (isMessageTree(node)) {
            node = Object.hasOwn(node, segment) ? node[segment] : undefined;
        } else {
            return undefined;
        }
    }
    return node;
}
