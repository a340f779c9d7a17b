export { Tater, createTater, interpolationArguments, LOOKUP_FAILED } from './tater';
export { CalendarDate } from './calendarDate';
export { parseOptions } from './config';
export { TaterError, MissingLocalizationFormat, UnLocalizableObject, MissingInterpolationArgument } from './errors';
export { interpolate, interpolationString } from './interpolate';
export { loadDirectory, findMessageFiles, parseMessageFile, MESSAGE_FILE_EXTENSIONS, type MessageFile } from './loader';
export { localize, stringFromNumeric, DEFAULT_FORMAT, DEFAULT_PRECISION, type MessageLookup } from './localize';
export { deepFreeze, deepMerge, dig, normalizeMessages, FUNCTION_REFERENCE_KEY } from './messages';
export {
    RESERVED_OPTIONS,
    type IncludesOptions,
    type InterpolationOptions,
    type LoadOptions,
    type LocalizeOptions,
    type LookupOptions,
    type MessageFunction,
    type MessagePaths,
    type MessageSource,
    type MessageTree,
    type MessageValue,
    type ResolvedTaterOptions,
    type TaterOptions,
    type TranslateOptions
} from './types';
