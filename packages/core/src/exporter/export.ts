import type { Directive, ExportFormat } from '@ledgerbridge/shared';
import { createPrinter, getPrinterRules } from '../printer/index.js';
import type { PrinterOptions, PrinterRules } from '../printer/index.js';

/**
 * Where rendered records go. A Node.js stream fits, so does an array push.
 */
export interface TextSink {
    write(chunk: string): unknown;
}

/**
 * Write directives to a sink, one record per directive, records separated
 * by a blank line.
 *
 * Directives are rendered and written strictly in input order. Any error
 * raised while rendering propagates before the offending record is written.
 *
 * @param directives - Ledger directives in file order
 * @param format - Format name or a rule table
 * @param sink - Destination of the text
 * @param options - Printer options
 */
export function exportDirectives(
    directives: readonly Directive[],
    format: ExportFormat | PrinterRules,
    sink: TextSink,
    options: PrinterOptions = {}
): void {
    const rules = typeof format === 'string' ? getPrinterRules(format) : format;
    const print = createPrinter(rules, options);

    for (const directive of directives) {
        sink.write(print(directive));
        sink.write('\n');
    }
}

/**
 * Same as exportDirectives, collected into a string.
 */
export function renderDirectives(
    directives: readonly Directive[],
    format: ExportFormat | PrinterRules,
    options: PrinterOptions = {}
): string {
    const chunks: string[] = [];
    exportDirectives(directives, format, { write: chunk => chunks.push(chunk) }, options);
    return chunks.join('');
}
