import { EXPORT_FORMAT_NAMES } from '@ledgerbridge/shared';
import type { ExportFormat } from '@ledgerbridge/shared';
import { createPrinter } from './dispatch.js';
import { HLEDGER_RULES } from './hledger.js';
import { LEDGER_RULES } from './ledger.js';
import type { Printer, PrinterOptions, PrinterRules } from './types.js';

/**
 * Registry of output dialects.
 */
const EXPORT_FORMATS: Record<ExportFormat, PrinterRules> = {
    ledger: LEDGER_RULES,
    hledger: HLEDGER_RULES,
};

/**
 * Get the list of supported format names.
 */
export function getSupportedFormats(): ExportFormat[] {
    return [...EXPORT_FORMAT_NAMES];
}

/**
 * Narrow an arbitrary name to a supported format.
 */
export function findExportFormat(name: string): ExportFormat | undefined {
    return EXPORT_FORMAT_NAMES.find(format => format === name);
}

/**
 * Look up the rule table of a format by name.
 *
 * @throws Error when the name is not a supported format
 */
export function getPrinterRules(name: string): PrinterRules {
    const format = findExportFormat(name);
    if (!format) {
        throw new Error(`Unknown export format: ${name}. Supported: ${EXPORT_FORMAT_NAMES.join(', ')}`);
    }
    return EXPORT_FORMATS[format];
}

/**
 * Printer for Ledger's journal format.
 */
export function createLedgerPrinter(options: PrinterOptions = {}): Printer {
    return createPrinter(LEDGER_RULES, options);
}

/**
 * Printer for hledger's journal format.
 */
export function createHledgerPrinter(options: PrinterOptions = {}): Printer {
    return createPrinter(HLEDGER_RULES, options);
}
