import { MissingInterpolationArgument } from './errors';
import type { InterpolationOptions } from './types';

const FORMAT_CURLY = '%{';
const FORMAT_NAMED = '%<';

/**
 * Matches, in order: an escaped percent sign, `%{name}`, and
 * `%<name>` with an optional printf conversion (flags, width, precision, type).
 */
const PLACEHOLDER_REGEX = /%%|%\{([^}]*)\}|%<([^>]*)>([-+ 0#]*)(\d+)?(?:\.(\d+))?([sdifeExXob])?/g;

/**
 * Determine whether a string includes any interpolation placeholder,
 * i.e. "%{" or "%<"
 */
export function interpolationString(string: string): boolean {
    return string.includes(FORMAT_CURLY) || string.includes(FORMAT_NAMED);
}

/**
 * Format values into a string, checking the string and options first.
 *
 * The string is returned untouched when `options` is empty or when it has no
 * placeholder at all, so a literal `%{...}` survives a call without arguments.
 *
 * @example interpolate('Hi %{name}', { name: 'Ada' }) // => 'Hi Ada'
 * @example interpolate('Hi %{name}', {}) // => 'Hi %{name}'
 * @example interpolate('%<total>.2f EUR', { total: 3.5 }) // => '3.50 EUR'
 * @throws {MissingInterpolationArgument} If a referenced name is not in `options`
 */
export function interpolate(string: string, options: InterpolationOptions = {}): string {
    if (Object.keys(options).length === 0) return string;
    if (!interpolationString(string)) return string;

    return string.replace(
        PLACEHOLDER_REGEX,
        (match: string, curly?: string, named?: string, flags?: string, width?: string, precision?: string, type?: string) => {
            if (match === '%%') return '%';

            const name = curly ?? named ?? '';
            const value = Object.hasOwn(options, name) ? options[name] : undefined;
            if (value === undefined) {
                throw new MissingInterpolationArgument(name);
            }

            if (curly !== undefined) return String(value);

            return formatConversion(
                value,
                flags ?? '',
                width === undefined ? undefined : Number(width),
                precision === undefined ? undefined : Number(precision),
                type ?? 's'
            );
        }
    );
}

function formatConversion(
    value: unknown,
    flags: string,
    width: number | undefined,
    precision: number | undefined,
    type: string
): string {
    let body: string;
    let sign = '';
    let numeric = true;

    switch (type) {
        case 's':
            body = String(value);
            if (precision !== undefined) body = body.slice(0, precision);
            numeric = false;
            break;
        case 'f':
        case 'e':
        case 'E': {
            const num = Number(value);
            body = type === 'f' ? Math.abs(num).toFixed(precision ?? 6) : exponential(Math.abs(num), precision ?? 6);
            if (type === 'E') body = body.toUpperCase();
            if (num < 0 || Object.is(num, -0)) sign = '-';
            break;
        }
        default: {
            const int = toInteger(value);
            const radix = type === 'x' || type === 'X' ? 16 : type === 'o' ? 8 : type === 'b' ? 2 : 10;
            body = (int < 0n ? -int : int).toString(radix);
            if (type === 'X') body = body.toUpperCase();
            if (flags.includes('#') && radix !== 10) {
                body = (radix === 16 ? '0x' : radix === 8 ? '0' : '0b') + body;
                if (type === 'X') body = body.toUpperCase();
            }
            if (int < 0n) sign = '-';
        }
    }

    if (numeric && sign === '') {
        if (flags.includes('+')) sign = '+';
        else if (flags.includes(' ')) sign = ' ';
    }

    const length = sign.length + body.length;
    if (width === undefined || length >= width) return sign + body;

    if (flags.includes('-')) return (sign + body).padEnd(width, ' ');
    if (numeric && flags.includes('0')) return sign + body.padStart(width - sign.length, '0');
    return (sign + body).padStart(width, ' ');
}

function toInteger(value: unknown): bigint {
    if (typeof value === 'bigint') return value;
    const num = Math.trunc(Number(value));
    return Number.isFinite(num) ? BigInt(num) : 0n;
}

// Two-digit exponent, as printf writes it: 1.5e+03 rather than 1.5e+3
function exponential(num: number, precision: number): string {
    return num.toExponential(precision).replace(/e([+-])(\d)$/, (_match, sign: string, digit: string) => `e${sign}0${digit}`);
}
