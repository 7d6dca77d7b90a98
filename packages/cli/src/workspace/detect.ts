import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

export const CONFIG_FILENAME = 'ledgerbridge.yaml';

/**
 * Outcome of looking for ledgerbridge.yaml.
 */
export interface ConfigSearch {
    /** Directory holding the config file, or null when none was found */
    root: string | null;
    /** Directories checked, nearest first */
    searched: string[];
}

/**
 * Looks for 'ledgerbridge.yaml' in startPath, then in each parent up to the
 * filesystem root. The nearest one wins.
 */
export function detectConfigRoot(startPath: string = process.cwd()): ConfigSearch {
    const searched: string[] = [];
    for (let dir = resolve(startPath); ; dir = dirname(dir)) {
        searched.push(dir);
        if (existsSync(join(dir, CONFIG_FILENAME))) {
            return { root: dir, searched };
        }
        if (dirname(dir) === dir) {
            return { root: null, searched };
        }
    }
}
