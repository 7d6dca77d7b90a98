/**
 * Printer module: per-directive text rendering for Ledger and hledger.
 */

export { createPrinter, renderDirective } from './dispatch.js';
export { LEDGER_RULES, renderLedgerPosting, renderTransaction } from './ledger.js';
export { HLEDGER_RULES, renderHledgerPosting } from './hledger.js';
export {
    getSupportedFormats,
    findExportFormat,
    getPrinterRules,
    createLedgerPrinter,
    createHledgerPrinter,
} from './registry.js';
export type {
    PostingContext,
    PostingRenderer,
    RenderContext,
    DirectiveRenderer,
    DirectiveRenderers,
    PrinterRules,
    PrinterOptions,
    Printer,
} from './types.js';
