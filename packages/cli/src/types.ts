/**
 * ledgerbridge CLI - Core Types
 */

import type { ExportFormat } from '@ledgerbridge/shared';

export interface ConvertOptions {
    /** Path of the ledger document (.yaml, .yml or .json) */
    input: string;
    /** Overrides the configured format */
    format?: ExportFormat;
    /** Output file; stdout when absent */
    output?: string;
    /** Directory to start looking for ledgerbridge.yaml from */
    cwd?: string;
}

export type CliCommand =
    | { kind: 'help' }
    | { kind: 'version' }
    | { kind: 'convert'; options: ConvertOptions };
