import Decimal from 'decimal.js';
import strftime from 'strftime';
import { CalendarDate } from './calendarDate';
import { MissingLocalizationFormat, UnLocalizableObject } from './errors';
import { isMessageList } from './messages';
import type { LocalizeOptions, MessageValue } from './types';

/**
 * Resolves a key of the message tree, for the given locale or the active one
 */
export type MessageLookup = (key: string, locale: string | undefined) => MessageValue | undefined;

/** Format key used when none is passed */
export const DEFAULT_FORMAT = 'default';

/** Default digits after the decimal separator */
export const DEFAULT_PRECISION = 2;

/** A digit followed by one or more complete groups of three digits */
const DELIMITING_REGEX = /(\d)(?=(\d\d\d)+(?!\d))/g;

/** Tokens that take names from the messages; `%%` is matched to keep it intact */
const SUBSTITUTION_REGEX = /%%|%(\^?)([aAbBpP])/g;

const strftimeUTC = strftime.utc();

/**
 * Render a string, number, date or list with the formatting rules found in
 * the messages (or passed as options).
 *
 * @param object - string, number, bigint, Decimal, Date, CalendarDate or array
 * @param options - Per-call overrides
 * @param lookup - Resolves formatting settings such as 'numeric.delimiter'
 * @throws {MissingLocalizationFormat} If a required setting cannot be resolved
 * @throws {UnLocalizableObject} For any other kind of value
 */
export function localize(object: unknown, options: LocalizeOptions, lookup: MessageLookup): string {
    if (typeof object === 'string') return object;

    if (typeof object === 'number' || typeof object === 'bigint' || object instanceof Decimal) {
        return localizeNumeric(object, options, lookup);
    }

    if (object instanceof Date || object instanceof CalendarDate) {
        return localizeDateTime(object, options, lookup);
    }

    if (Array.isArray(object)) {
        return localizeArray(object.map((item: unknown) => String(item)), options, lookup);
    }

    throw new UnLocalizableObject(kindOf(object));
}

function kindOf(object: unknown): string {
    if (object === null) return 'null';
    if (typeof object !== 'object') return typeof object;
    const ctor: unknown = Object.getPrototypeOf(object)?.constructor;
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
}

function resolveSetting(
    override: string | undefined,
    key: string,
    options: LocalizeOptions,
    lookup: MessageLookup
): string | undefined {
    if (override !== undefined) return override;
    const value = lookup(key, options.locale);
    return typeof value === 'string' ? value : undefined;
}

// --- NUMERIC ---

/**
 * Convert a number to a plain decimal string, never in exponent notation.
 * Decimals always carry a fractional part, like '1.0'.
 */
export function stringFromNumeric(value: number | bigint | Decimal): string {
    if (typeof value === 'bigint') return value.toString();

    if (value instanceof Decimal) {
        const fixed = value.toFixed();
        return fixed.includes('.') ? fixed : `${fixed}.0`;
    }

    const plain = String(value);
    return /e/i.test(plain) ? new Decimal(value).toFixed() : plain;
}

function localizeNumeric(value: number | bigint | Decimal, options: LocalizeOptions, lookup: MessageLookup): string {
    const delimiter = resolveSetting(options.delimiter, 'numeric.delimiter', options, lookup);
    const separator = resolveSetting(options.separator, 'numeric.separator', options, lookup);
    const precision = options.precision ?? DEFAULT_PRECISION;

    if (delimiter === undefined) {
        throw new MissingLocalizationFormat('Numeric localization delimiter', 'numeric.delimiter', 'delimiter');
    }
    if (separator === undefined) {
        throw new MissingLocalizationFormat('Numeric localization separator', 'numeric.separator', 'separator');
    }

    const finite = value instanceof Decimal ? value.isFinite() : typeof value === 'bigint' || Number.isFinite(value);
    if (!finite) {
        throw new UnLocalizableObject(String(value));
    }

    const parts = stringFromNumeric(value).split('.');
    const integer = parts[0];
    const fraction: string | undefined = parts[1];
    const grouped = integer.replace(DELIMITING_REGEX, (digit: string) => `${digit}${delimiter}`);

    if (precision <= 0 || fraction === undefined) {
        return grouped;
    }
    return `${grouped}${separator}${fraction.padEnd(precision, '0').slice(0, precision)}`;
}

// --- DATE / TIME ---

interface DateFields {
    /** 'date' or 'time', the branch of the messages holding the formats */
    type: string;
    weekday: number;
    /** 1-12 */
    month: number;
    /** Only set for values that carry a time of day */
    hour?: number;
    render: (pattern: string) => string;
}

function dateFields(value: Date | CalendarDate): DateFields {
    if (value instanceof CalendarDate) {
        if (!value.isValid()) throw new UnLocalizableObject(`Invalid CalendarDate ${value.toString()}`);
        return {
            type: 'date',
            weekday: value.weekday,
            month: value.month,
            render: (pattern) => strftimeUTC(pattern, value.toUTCDate())
        };
    }

    if (Number.isNaN(value.getTime())) throw new UnLocalizableObject('Invalid Date');
    return {
        type: 'time',
        weekday: value.getDay(),
        month: value.getMonth() + 1,
        hour: value.getHours(),
        render: (pattern) => strftime(pattern, value)
    };
}

function localizeDateTime(value: Date | CalendarDate, options: LocalizeOptions, lookup: MessageLookup): string {
    const fields = dateFields(value);
    const format = options.format ?? DEFAULT_FORMAT;
    const configured = lookup(`${fields.type}.formats.${format}`, options.locale);
    const pattern = typeof configured === 'string' ? configured : format;

    const nameAt = (key: string, index: number): string => {
        const names = lookup(key, options.locale);
        const name = isMessageList(names) ? names[index] : undefined;
        if (typeof name !== 'string') {
            throw new MissingLocalizationFormat('Date localization names', key);
        }
        return name;
    };

    const substituted = pattern.replace(SUBSTITUTION_REGEX, (match: string, caret?: string, token?: string) => {
        let text: string;
        switch (token) {
            case 'a': text = nameAt('date.abbreviated_days', fields.weekday); break;
            case 'A': text = nameAt('date.days', fields.weekday); break;
            case 'b': text = nameAt('date.abbreviated_months', fields.month - 1); break;
            case 'B': text = nameAt('date.months', fields.month - 1); break;
            case 'p':
            case 'P': {
                // No time of day, no marker
                if (fields.hour === undefined) return '';
                const key = fields.hour < 12 ? 'time.am' : 'time.pm';
                const marker = lookup(key, options.locale);
                if (typeof marker !== 'string') {
                    throw new MissingLocalizationFormat('Time localization marker', key);
                }
                text = token === 'p' ? marker.toUpperCase() : marker.toLowerCase();
                break;
            }
            default:
                return match;
        }
        return caret ? text.toUpperCase() : text;
    });

    return substituted.includes('%') ? fields.render(substituted) : substituted;
}

// --- ARRAY ---

function localizeArray(items: readonly string[], options: LocalizeOptions, lookup: MessageLookup): string {
    switch (items.length) {
        case 0:
            return '';
        case 1:
            return items[0];
        case 2: {
            const twoWords = resolveSetting(options.two_words_connector, 'array.two_words_connector', options, lookup);
            if (twoWords === undefined) {
                throw new MissingLocalizationFormat('Sentence localization connector', 'array.two_words_connector', 'two_words_connector');
            }
            return `${items[0]}${twoWords}${items[1]}`;
        }
        default: {
            const lastWord = resolveSetting(options.last_word_connector, 'array.last_word_connector', options, lookup);
            const words = resolveSetting(options.words_connector, 'array.words_connector', options, lookup);
            if (lastWord === undefined) {
                throw new MissingLocalizationFormat('Sentence localization connector', 'array.last_word_connector', 'last_word_connector');
            }
            if (words === undefined) {
                throw new MissingLocalizationFormat('Sentence localization connector', 'array.words_connector', 'words_connector');
            }
            return `${items.slice(0, -1).join(words)}${lastWord}${items[items.length - 1]}`;
        }
    }
}
