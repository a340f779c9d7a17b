/**
 * Message files on disk
 *
 * Reads every `.yml`, `.yaml` and `.json` file below a directory. Nothing is
 * merged here: each file is returned as parsed, in sorted path order, and
 * `Tater#load` merges them in that order (later files win on conflicts).
 *
 * @example
 * ```
 * locales/
 *   en.yml          # { en: { title: 'Title' } }
 *   fr/app.yml      # { fr: { title: 'Titre' } }
 *   shared.json
 * ```
 */

import { readdirSync, readFileSync, statSync } from 'node:fs';
import { extname, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { TaterError } from './errors';

/** Extensions picked up by `loadDirectory`, matched case-insensitively */
export const MESSAGE_FILE_EXTENSIONS: ReadonlySet<string> = new Set(['.yml', '.yaml', '.json']);

/**
 * A parsed message file
 */
export interface MessageFile {
    /** Path of the file, joined onto the directory that was loaded */
    file: string;
    /** Top-level mapping of the file, still unnormalized */
    messages: Record<string, unknown>;
}

function isMapping(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * List message files below `dir`, recursing into subdirectories.
 * Entries of each directory are visited in name order.
 */
export function findMessageFiles(dir: string): string[] {
    const files: string[] = [];
    const entries = readdirSync(dir, { withFileTypes: true })
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) {
            files.push(...findMessageFiles(full));
        } else if (entry.isFile() && MESSAGE_FILE_EXTENSIONS.has(extname(entry.name).toLowerCase())) {
            files.push(full);
        }
    }
    return files;
}

/**
 * Parse one message file. Empty documents yield `undefined`.
 *
 * @throws {TaterError} If the document is not a mapping
 * @throws Whatever `readFileSync`, `JSON.parse` or the YAML parser throws
 */
export function parseMessageFile(file: string): Record<string, unknown> | undefined {
    const text = readFileSync(file, 'utf8');
    const parsed: unknown = extname(file).toLowerCase() === '.json' ? JSON.parse(text) : parseYaml(text);

    if (parsed === null || parsed === undefined) return undefined;
    if (!isMapping(parsed)) {
        throw new TaterError(`[tater] loadDirectory: '${file}' must contain a mapping at the top level`);
    }
    return parsed;
}

/**
 * Read and parse every message file below `dir`.
 * A directory that does not exist yields nothing and logs a warning.
 *
 * @param dir - Directory to search
 * @returns Parsed files in the order they should be merged
 */
export function loadDirectory(dir: string): MessageFile[] {
    const stats = statSync(dir, { throwIfNoEntry: false });
    if (!stats?.isDirectory()) {
        console.warn(`[tater] loadDirectory: '${dir}' is not a directory, no messages loaded.`);
        return [];
    }

    const loaded: MessageFile[] = [];
    for (const file of findMessageFiles(dir)) {
        const messages = parseMessageFile(file);
        if (messages) loaded.push({ file, messages });
    }
    return loaded;
}
