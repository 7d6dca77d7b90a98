import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse } from 'yaml';
import { ExportConfigSchema, type ExportConfig } from '@ledgerbridge/shared';
import { CONFIG_FILENAME } from './detect.js';

/**
 * Loads ledgerbridge.yaml from a config root.
 * Without a root, returns the defaults.
 */
export function loadExportConfig(root: string | null): ExportConfig {
    if (!root) {
        return ExportConfigSchema.parse({});
    }
    const path = join(root, CONFIG_FILENAME);
    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);

    // An empty file means defaults
    const result = ExportConfigSchema.safeParse(data ?? {});
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid ${path}: ${issues.join('; ')}`);
    }
    return result.data;
}
