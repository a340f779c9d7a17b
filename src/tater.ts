import { parseOptions } from './config';
import { interpolate } from './interpolate';
import { loadDirectory } from './loader';
import { localize as localizeValue } from './localize';
import { deepFreeze, deepMerge, dig, isMessageFunction, normalizeMessages, SEPARATOR } from './messages';
import {
    RESERVED_OPTIONS,
    type IncludesOptions,
    type InterpolationOptions,
    type LoadOptions,
    type LocalizeOptions,
    type LookupOptions,
    type MessageFunction,
    type MessageTree,
    type MessageValue,
    type TaterOptions,
    type TranslateOptions
} from './types';

/** Prefix of the string `translate` returns when nothing is found */
export const LOOKUP_FAILED = 'Tater lookup failed';

/**
 * Resolved values per key, for one locale. A key mapped to `undefined` is a
 * cached miss.
 */
interface LocaleCache {
    exact: Map<string, MessageValue | undefined>;
    cascade: Map<string, MessageValue | undefined>;
}

/**
 * Remove every reserved option name, leaving the interpolation arguments
 */
export function interpolationArguments(options: InterpolationOptions): InterpolationOptions {
    const args: InterpolationOptions = {};
    for (const [name, value] of Object.entries(options)) {
        if (!RESERVED_OPTIONS.has(name)) args[name] = value;
    }
    return args;
}

/**
 * Messages, lookups and localization for any number of locales.
 *
 * @example
 * ```ts
 * const i18n = new Tater({
 *     locale: 'en',
 *     messages: { en: { greeting: 'Hello, %{name}!' } }
 * });
 *
 * i18n.translate('greeting', { name: 'Ada' }); // => 'Hello, Ada!'
 * i18n.translate('nope'); // => 'Tater lookup failed: en.nope'
 * ```
 */
export class Tater {
    private tree: MessageTree = Object.freeze({});
    private locales: readonly string[] = Object.freeze([]);
    private localeSet: ReadonlySet<string> = new Set();
    private cache = new Map<string, LocaleCache>();
    private activeLocale: string | undefined;
    private functions: Readonly<Record<string, MessageFunction>>;
    private readonly cascadeByDefault: boolean;
    private readonly debug: boolean;
    private readonly onMissingKey: ((key: string, locale: string) => void) | undefined;

    /**
     * @throws {Error} If an option has the wrong type (see `parseOptions`)
     * @throws Anything `load` throws for `path` or `messages`
     */
    constructor(options: TaterOptions = {}) {
        const config = parseOptions(options);

        this.activeLocale = config.locale;
        this.cascadeByDefault = config.cascade;
        this.debug = config.debug;
        this.functions = config.functions;
        this.onMissingKey = config.onMissingKey;

        this.load({ path: config.path, messages: config.messages });
    }

    // --- LOCALE DIRECTORY ---

    /** The active locale */
    get locale(): string | undefined {
        return this.activeLocale;
    }

    /**
     * Switch the active locale. Locales that are not available are ignored.
     */
    set locale(candidate: string) {
        if (this.isAvailable(candidate)) {
            this.activeLocale = candidate;
        } else if (this.debug) {
            console.warn(`[tater] Locale '${candidate}' is not available. Keeping '${this.activeLocale ?? ''}'.`);
        }
    }

    /**
     * Sorted locale codes, i.e. the top-level keys of the loaded messages
     */
    available(): readonly string[] {
        return this.locales;
    }

    isAvailable(locale: string): boolean {
        return this.localeSet.has(locale);
    }

    /** Do lookups cascade by default? */
    cascades(): boolean {
        return this.cascadeByDefault;
    }

    /** The merged, frozen message tree */
    get messages(): MessageTree {
        return this.tree;
    }

    // --- LOADING ---

    /**
     * Make a function available to message files as `{ $fn: name }`.
     * Only affects sources loaded afterwards.
     */
    registerFunction(name: string, fn: MessageFunction): void {
        if (name.trim() === '') {
            throw new Error('[tater] registerFunction: name must be a non-empty string');
        }
        this.functions = Object.freeze({ ...this.functions, [name]: fn });
    }

    /**
     * Merge messages from a directory of message files and/or an object.
     * Files are merged first in path order, `messages` last; later sources
     * win wherever both sides are not mappings.
     *
     * The merged tree is frozen and replaces the current one, the available
     * locales are recomputed and every cached lookup is dropped. Calling it
     * with nothing does nothing.
     *
     * @throws Read and parse errors of message files, unwrapped
     * @throws {TaterError} For an unknown `$fn` name or an unsupported value
     */
    load({ path, messages }: LoadOptions = {}): void {
        if (path === undefined && messages === undefined) return;

        let tree = this.tree;
        if (path !== undefined) {
            for (const file of loadDirectory(path)) {
                tree = deepMerge(tree, normalizeMessages(file.messages, this.functions));
            }
        }
        if (messages !== undefined) {
            tree = deepMerge(tree, normalizeMessages(messages, this.functions));
        }

        const locales = Object.keys(tree).sort();
        this.tree = deepFreeze(tree);
        this.locales = Object.freeze(locales);
        this.localeSet = new Set(locales);
        this.cache = new Map(
            locales.map((locale): [string, LocaleCache] => [locale, { exact: new Map(), cascade: new Map() }])
        );
    }

    // --- LOOKUP ---

    /**
     * Find the value at a period-separated key path, without interpolation.
     *
     * When cascading, a miss retries with the second-to-last segment removed
     * until only the final segment is left: `a.b.c.d`, `a.b.d`, `a.d`, `d`.
     *
     * @example i18n.lookup('greeting.world') // => 'Hello, world!'
     * @returns Whatever is stored at the key, or undefined
     */
    lookup(key: string, { locale, cascade }: LookupOptions = {}): MessageValue | undefined {
        const target = locale ?? this.activeLocale;
        if (target === undefined) return undefined;

        const cached = this.cache.get(target);
        if (!cached) return undefined;

        const cascading = cascade ?? this.cascadeByDefault;
        const bucket = cascading ? cached.cascade : cached.exact;
        if (bucket.has(key)) return bucket.get(key);

        const found = this.resolve(target, key, cascading);
        bucket.set(key, found);
        return found;
    }

    private resolve(locale: string, key: string, cascade: boolean): MessageValue | undefined {
        const messages = this.tree[locale];
        const path = key.split(SEPARATOR);

        let message = dig(messages, path);
        if (message !== undefined || !cascade) return message;

        while (path.length > 1) {
            path.splice(path.length - 2, 1);
            message = dig(messages, path);
            if (message !== undefined) return message;
        }
        return undefined;
    }

    /**
     * Locales to search, and how to name them in a failure message
     */
    private candidates({ locale, locales }: IncludesOptions): { search: string[]; label: string } {
        if (locales !== undefined) {
            const search = [...locales];
            if (this.activeLocale !== undefined && !search.includes(this.activeLocale)) {
                search.push(this.activeLocale);
            }
            return { search, label: `[${search.map((code) => JSON.stringify(code)).join(', ')}]` };
        }
        if (locale !== undefined) {
            return { search: [locale], label: locale };
        }
        return {
            search: this.activeLocale === undefined ? [] : [this.activeLocale],
            label: this.activeLocale ?? ''
        };
    }

    private find(key: string, search: readonly string[], cascade: boolean | undefined): MessageValue | undefined {
        for (const locale of search) {
            const found = this.lookup(key, { locale, cascade });
            if (found !== undefined) return found;
        }
        return undefined;
    }

    /**
     * Check that there is a value, of any kind, at the key path.
     * `locales` takes precedence over `locale`.
     */
    includes(key: string, options: IncludesOptions = {}): boolean {
        const { search } = this.candidates(options);
        return this.find(key, search, options.cascade) !== undefined;
    }

    // --- TRANSLATION ---

    /**
     * Look up a key and turn it into a string.
     *
     * A string is interpolated with the non-reserved options; a function is
     * called with the key and those options. Anything else counts as missing:
     * `options.default` is returned if given, otherwise
     * `Tater lookup failed: <locale>.<key>`.
     *
     * @throws {MissingInterpolationArgument} If the string needs an argument
     *   that options lack (only when there are arguments at all)
     */
    translate(key: string, options: TranslateOptions = {}): string {
        const { search, label } = this.candidates(options);
        const message = this.find(key, search, options.cascade);

        if (isMessageFunction(message)) {
            return message(key, interpolationArguments(options));
        }
        if (typeof message === 'string') {
            return interpolate(message, interpolationArguments(options));
        }

        this.reportMissing(key, label);
        return options.default ?? `${LOOKUP_FAILED}: ${label}.${key}`;
    }

    /** Alias of `translate` */
    t(key: string, options?: TranslateOptions): string {
        return this.translate(key, options);
    }

    private reportMissing(key: string, label: string): void {
        if (this.onMissingKey) {
            this.onMissingKey(key, label);
        } else if (this.debug) {
            console.warn(`[tater] Key '${key}' missing in '${label}'.`);
        }
    }

    // --- LOCALIZATION ---

    /**
     * Render a string, number, bigint, Decimal, Date, CalendarDate or array
     * with the formats of the active locale (or `options.locale`).
     *
     * @throws {MissingLocalizationFormat} If a required format is missing
     * @throws {UnLocalizableObject} For values of any other kind
     */
    localize(object: unknown, options: LocalizeOptions = {}): string {
        return localizeValue(object, options, (key, locale) => this.lookup(key, { locale }));
    }

    /** Alias of `localize` */
    l(object: unknown, options?: LocalizeOptions): string {
        return this.localize(object, options);
    }

    toString(): string {
        return `Tater(cascade=${this.cascadeByDefault}, locale=${JSON.stringify(this.activeLocale ?? null)}, available=[${this.locales.join(', ')}])`;
    }
}

/**
 * Creates a new Tater instance
 *
 * @example
 * ```ts
 * import { createTater } from 'tater-i18n';
 *
 * export const i18n = createTater({ path: './locales', locale: 'en' });
 * export const t = i18n.t.bind(i18n);
 * ```
 */
export function createTater(options: TaterOptions = {}): Tater {
    return new Tater(options);
}
