import { existsSync, readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';
import {
    DIRECTIVE_TYPES,
    DirectiveSchema,
    LedgerDocumentSchema,
    type Directive,
    type LedgerLoadResult,
} from '@ledgerbridge/shared';

const DirectiveTypeProbe = z.object({ type: z.string() });

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/**
 * Validate a parsed ledger document into directives.
 *
 * Entries of a kind this tool does not know are dropped with a warning.
 * Malformed entries of a known kind are an error: the output would
 * otherwise silently miss postings.
 *
 * @param data - Parsed YAML or JSON
 * @returns Directives in document order, plus warnings
 */
export function parseLedgerDocument(data: unknown): LedgerLoadResult {
    if (data === null || data === undefined) {
        return { directives: [], warnings: ['Ledger document is empty'] };
    }

    const document = LedgerDocumentSchema.safeParse(data);
    if (!document.success) {
        throw new Error('Ledger document must be a list of directives or an object with a "directives" list');
    }
    const entries = Array.isArray(document.data) ? document.data : document.data.directives;

    const directives: Directive[] = [];
    const warnings: string[] = [];

    entries.forEach((entry, index) => {
        const probe = DirectiveTypeProbe.safeParse(entry);
        if (!probe.success) {
            throw new Error(`Entry ${index}: missing directive type`);
        }

        const entryType = probe.data.type;
        const kind = DIRECTIVE_TYPES.find(type => type === entryType);
        if (!kind) {
            warnings.push(`Entry ${index}: unsupported directive type "${entryType}" dropped`);
            return;
        }

        const result = DirectiveSchema.safeParse(entry);
        if (!result.success) {
            throw new Error(`Entry ${index} (${kind}): ${describeIssues(result.error)}`);
        }
        directives.push(result.data);
    });

    return { directives, warnings };
}

/**
 * Read and validate a ledger document from disk.
 */
export function loadLedger(path: string): LedgerLoadResult {
    if (!existsSync(path)) {
        throw new Error(`Ledger file not found: ${path}`);
    }

    const extension = extname(path).toLowerCase();
    if (!['.yaml', '.yml', '.json'].includes(extension)) {
        throw new Error(`Unsupported ledger file type "${extension}". Expected .yaml, .yml or .json`);
    }

    const content = readFileSync(path, 'utf-8');
    let data: unknown;
    try {
        data = extension === '.json' ? JSON.parse(content) : parse(content);
    } catch (err) {
        throw new Error(`Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }

    return parseLedgerDocument(data);
}
