// --- MESSAGE TREE ---

/**
 * A message stored as a function instead of a string.
 * Receives the key that was translated and the caller's options with every
 * reserved option name removed.
 *
 * @example
 * ```ts
 * const greet: MessageFunction = (key, options) => `Hey ${options.name ?? key}!`;
 * ```
 */
export type MessageFunction = (key: string, options: InterpolationOptions) => string;

/**
 * Anything that can sit at a key of the message tree
 */
export type MessageValue = string | MessageFunction | readonly MessageValue[] | MessageTree;

/**
 * Nested, string-keyed messages. At the top level the keys are locales.
 *
 * @example
 * ```ts
 * const messages: MessageTree = {
 *     en: { login: { title: 'Login' } },
 *     fr: { login: { title: 'Connexion' } }
 * };
 * ```
 */
export interface MessageTree {
    readonly [key: string]: MessageValue;
}

/**
 * Recursive type to generate dot-notation keys from a locale's messages
 * @example
 * type Schema = { nav: { dashboard: string } };
 * // Results in: "nav" | "nav.dashboard"
 */
export type MessagePaths<T> = T extends string | MessageFunction | readonly unknown[]
    ? never
    : T extends object
        ? {
            [K in keyof T]: `${Exclude<K, symbol>}${'' | `.${MessagePaths<T[K]>}`}`;
        }[keyof T]
        : never;

// --- OPTIONS ---

/**
 * Values handed to the interpolator or to a message function
 */
export interface InterpolationOptions {
    [name: string]: unknown;
}

/**
 * Options accepted by `lookup`
 */
export interface LookupOptions {
    /** Locale to use in lieu of the active one */
    locale?: string;
    /** Force cascading on or off for this lookup */
    cascade?: boolean;
}

/**
 * Options accepted by `includes`
 */
export interface IncludesOptions extends LookupOptions {
    /**
     * Locales to try in order. Takes precedence over `locale`; the active
     * locale is tried last when it is not in the list.
     */
    locales?: readonly string[];
}

/**
 * Options accepted by `translate`. Every name that is not reserved is
 * available to the message as an interpolation argument.
 */
export interface TranslateOptions extends InterpolationOptions {
    locale?: string;
    locales?: readonly string[];
    cascade?: boolean;
    /** Returned instead of the failure message when nothing is found */
    default?: string;
}

/**
 * Options accepted by `localize`
 */
export interface LocalizeOptions {
    locale?: string;
    /** Key below `<type>.formats`, or a strftime pattern (default: 'default') */
    format?: string;
    /** Thousands delimiter, overrides `numeric.delimiter` */
    delimiter?: string;
    /** Decimal separator, overrides `numeric.separator` */
    separator?: string;
    /** Digits after the separator (default: 2) */
    precision?: number;
    /** Overrides `array.two_words_connector` */
    two_words_connector?: string;
    /** Overrides `array.words_connector` */
    words_connector?: string;
    /** Overrides `array.last_word_connector` */
    last_word_connector?: string;
}

/**
 * Option names that never reach the interpolator or a message function
 */
export const RESERVED_OPTIONS: ReadonlySet<string> = new Set([
    'locale',
    'locales',
    'cascade',
    'default',
    'format',
    'delimiter',
    'separator',
    'precision',
    'two_words_connector',
    'words_connector',
    'last_word_connector'
]);

// --- CONFIGURATION ---

/**
 * Configuration object passed to `new Tater()`
 *
 * @example
 * ```ts
 * const i18n = new Tater({
 *     path: './locales',
 *     locale: 'en',
 *     cascade: true,
 *     functions: { greet: (key) => `Hey ${key}!` }
 * });
 * ```
 */
export interface TaterOptions {
    /** Directory to search recursively for .yml, .yaml and .json message files */
    path?: string;
    /** Messages merged in after anything read from `path` */
    messages?: MessageSource;
    /** Initial active locale */
    locale?: string;
    /** Whether lookups cascade by default (default: false) */
    cascade?: boolean;
    /**
     * Functions that message files may reference as `{ $fn: name }`.
     * Can be extended later with `registerFunction`.
     */
    functions?: Record<string, MessageFunction>;
    /** Log missed translations and rejected locale switches (default: false) */
    debug?: boolean;
    /**
     * Callback when `translate` finds nothing for a key.
     * @param key - The missing translation key
     * @param locale - The locale, or JSON list of locales, that was searched
     */
    onMissingKey?: (key: string, locale: string) => void;
}

/**
 * Construction options after validation and defaults
 */
export interface ResolvedTaterOptions {
    path?: string;
    messages?: MessageSource;
    locale?: string;
    cascade: boolean;
    functions: Readonly<Record<string, MessageFunction>>;
    debug: boolean;
    onMissingKey?: (key: string, locale: string) => void;
}

/**
 * Raw messages handed to `load`: a plain object or a `Map`, nested freely.
 * Keys of a `Map` are stringified when the source is merged.
 */
export type MessageSource = Readonly<Record<string, unknown>> | ReadonlyMap<unknown, unknown>;

/**
 * Sources accepted by `load`
 */
export interface LoadOptions {
    path?: string;
    messages?: MessageSource;
}
