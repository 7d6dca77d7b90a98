/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
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
} from '@ledgerbridge/shared';

export {
    DirectiveSchema,
    TransactionSchema,
    ROUNDING_ACCOUNT,
    EXPORT_FORMAT_NAMES,
    COLUMN_WIDTHS,
} from '@ledgerbridge/shared';
