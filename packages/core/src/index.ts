// Types (re-exported from shared)
export type {
    Amount,
    Cost,
    Posting,
    Transaction,
    Balance,
    Open,
    Close,
    Note,
    Document,
    Pad,
    Price,
    Event,
    Commodity,
    Query,
    Custom,
    Directive,
    DirectiveMap,
    DirectiveType,
    ExportFormat,
} from './types/index.js';

export {
    DirectiveSchema,
    TransactionSchema,
    ROUNDING_ACCOUNT,
    EXPORT_FORMAT_NAMES,
    COLUMN_WIDTHS,
} from './types/index.js';

// Utils
export { quoteCurrency, formatDate, formatAmount, positionStrings } from './utils/index.js';

// Classifier
export { classifyPosting, classifyPostings, needsCostAsPrice } from './classifier/index.js';
export type { PostingClass, PostingClasses } from './classifier/index.js';

// Residual
export { fillResidualPosting, computeResidual, getPostingWeight } from './residual/index.js';
export type { ResidualBalancer } from './residual/index.js';

// Printers
export {
    createPrinter,
    renderDirective,
    LEDGER_RULES,
    HLEDGER_RULES,
    getSupportedFormats,
    findExportFormat,
    getPrinterRules,
    createLedgerPrinter,
    createHledgerPrinter,
} from './printer/index.js';
export type { PrinterRules, PrinterOptions, Printer, PostingContext, RenderContext } from './printer/index.js';

// Exporter
export { exportDirectives, renderDirectives } from './exporter/index.js';
export type { TextSink } from './exporter/index.js';
