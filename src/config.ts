/**
 * Construction options for tater-i18n
 *
 * `new Tater(options)` runs its options through `parseOptions`, which applies
 * defaults and rejects values of the wrong type before anything is loaded.
 *
 * @example
 * ```ts
 * import { parseOptions } from 'tater-i18n';
 *
 * const options = parseOptions({ locale: 'en', cascade: true });
 * // => { locale: 'en', cascade: true, debug: false, functions: {} }
 * ```
 */

import { isMessageFunction } from './messages';
import type { MessageFunction, MessageSource, ResolvedTaterOptions } from './types';

/**
 * Default values for construction options
 */
const DEFAULTS = {
    cascade: false,
    debug: false
} as const;

function fail(message: string): never {
    throw new Error(`[tater] parseOptions: ${message}`);
}

function got(value: unknown): string {
    return `got ${typeof value}: ${JSON.stringify(value)}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMessageSource(value: unknown): value is MessageSource {
    return value instanceof Map || isRecord(value);
}

/**
 * Validate construction options and apply defaults.
 *
 * @param input - Options as given by the caller
 * @returns Frozen options object
 *
 * @throws {Error} If options is not an object
 * @throws {Error} If path is not a non-empty string (when provided)
 * @throws {Error} If locale is not a string, or is empty after trimming
 * @throws {Error} If cascade or debug is not a boolean (when provided)
 * @throws {Error} If messages is not an object or Map (when provided)
 * @throws {Error} If functions is not an object of functions (when provided)
 * @throws {Error} If onMissingKey is not a function (when provided)
 */
export function parseOptions(input: unknown = {}): Readonly<ResolvedTaterOptions> {
    if (!isRecord(input)) {
        fail(`options must be an object, ${got(input)}`);
    }

    const { path, messages, locale, cascade, debug, functions, onMissingKey } = input;

    if (path !== undefined && (typeof path !== 'string' || path.trim() === '')) {
        fail(`path must be a non-empty string, ${got(path)}`);
    }

    if (messages !== undefined && !isMessageSource(messages)) {
        fail(`messages must be an object or a Map, ${got(messages)}`);
    }

    if (cascade !== undefined && typeof cascade !== 'boolean') {
        fail(`cascade must be a boolean, ${got(cascade)}`);
    }

    if (debug !== undefined && typeof debug !== 'boolean') {
        fail(`debug must be a boolean, ${got(debug)}`);
    }

    if (onMissingKey !== undefined && !isMissingKeyCallback(onMissingKey)) {
        fail(`onMissingKey must be a function, ${got(onMissingKey)}`);
    }

    const registered: Record<string, MessageFunction> = {};
    if (functions !== undefined) {
        if (!isRecord(functions)) {
            fail(`functions must be an object, ${got(functions)}`);
        }
        for (const [name, fn] of Object.entries(functions)) {
            if (!isMessageFunction(fn)) {
                fail(`functions.${name} must be a function, ${got(fn)}`);
            }
            registered[name] = fn;
        }
    }

    let trimmedLocale: string | undefined;
    if (locale !== undefined) {
        if (typeof locale !== 'string') {
            fail(`locale must be a string, ${got(locale)}`);
        }
        trimmedLocale = locale.trim();
        if (trimmedLocale === '') {
            fail('locale must be a non-empty string');
        }
        if (trimmedLocale !== locale) {
            console.warn(`[tater] parseOptions: trimmed whitespace from locale '${locale}' → '${trimmedLocale}'.`);
        }
    }

    const resolved: ResolvedTaterOptions = {
        path: typeof path === 'string' ? path : undefined,
        messages: isMessageSource(messages) ? messages : undefined,
        locale: trimmedLocale,
        cascade: typeof cascade === 'boolean' ? cascade : DEFAULTS.cascade,
        debug: typeof debug === 'boolean' ? debug : DEFAULTS.debug,
        functions: Object.freeze(registered),
        onMissingKey: isMissingKeyCallback(onMissingKey) ? onMissingKey : undefined
    };

    // Return frozen object to prevent accidental mutation
    return Object.freeze(resolved);
}

function isMissingKeyCallback(value: unknown): value is (key: string, locale: string) => void {
    return typeof value === 'function';
}
