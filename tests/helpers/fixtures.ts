import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

/** Directory holding the message files used by the tests */
export const FIXTURES_DIR = fileURLToPath(new URL('../fixtures/', import.meta.url));

export function fixture(...segments: string[]): string {
    return join(FIXTURES_DIR, ...segments);
}
