import { writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { exportDirectives, renderDirectives } from '@ledgerbridge/core';
import { CONFIG_FILENAME, detectConfigRoot } from '../workspace/detect.js';
import { loadExportConfig } from '../workspace/config.js';
import { loadLedger } from '../input/load.js';
import { arrow, success, warn } from '../utils/console.js';
import type { ConvertOptions } from '../types.js';

/**
 * Convert a ledger document and write it to a file or stdout.
 * Command-line options take precedence over ledgerbridge.yaml.
 */
export async function convertLedger(options: ConvertOptions): Promise<void> {
    // 1. Configuration
    const { root, searched } = detectConfigRoot(options.cwd);
    const config = loadExportConfig(root);
    if (root) {
        arrow(`Config: ${join(root, CONFIG_FILENAME)}`);
    } else {
        arrow(`No ${CONFIG_FILENAME} found (searched ${searched.join(', ')}); using defaults`);
    }

    const format = options.format ?? config.format;
    const configOutput = root && config.output ? resolve(root, config.output) : undefined;
    const output = options.output ?? configOutput;

    // 2. Load directives
    arrow(`Loading ${options.input}...`);
    const { directives, warnings } = loadLedger(options.input);
    for (const warning of warnings) {
        warn(warning);
    }

    // 3. Export
    if (output) {
        await writeFile(output, renderDirectives(directives, format), 'utf-8');
        success(`Wrote ${directives.length} directives to ${output} (${format})`);
    } else {
        exportDirectives(directives, format, process.stdout);
    }
}
