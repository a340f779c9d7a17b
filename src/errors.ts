/**
 * Base class for every error thrown by tater-i18n itself.
 * Read and parse failures from the directory loader are not wrapped.
 */
export class TaterError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * A formatting setting needed by `localize` is neither passed as an option
 * nor present in the messages of the locale.
 */
export class MissingLocalizationFormat extends TaterError {
    /** Message key that was looked up, e.g. 'numeric.delimiter' */
    readonly key: string;
    /** Option that would have overridden it, if there is one */
    readonly option: string | undefined;

    constructor(description: string, key: string, option?: string) {
        super(
            option
                ? `[tater] ${description} ('${key}') missing or not passed as option :${option}`
                : `[tater] ${description} ('${key}') missing`
        );
        this.key = key;
        this.option = option;
    }
}

/**
 * `localize` received a value it has no renderer for.
 */
export class UnLocalizableObject extends TaterError {
    /** Kind of the rejected value, e.g. 'object' or 'Invalid Date' */
    readonly kind: string;

    constructor(kind: string) {
        super(`[tater] The object class ${kind} cannot be localized by Tater.`);
        this.kind = kind;
    }
}

/**
 * A message references a placeholder that the supplied options lack.
 */
export class MissingInterpolationArgument extends TaterError {
    readonly argument: string;

    constructor(argument: string) {
        super(`[tater] key<${argument}> not found in interpolation arguments`);
        this.argument = argument;
    }
}
