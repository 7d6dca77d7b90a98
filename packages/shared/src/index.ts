// Schemas
export {
    AmountSchema,
    CostSchema,
    PostingSchema,
    TransactionSchema,
    BalanceSchema,
    OpenSchema,
    CloseSchema,
    NoteSchema,
    DocumentSchema,
    PadSchema,
    PriceSchema,
    EventSchema,
    CommoditySchema,
    QuerySchema,
    CustomSchema,
    DirectiveSchema,
    LedgerDocumentSchema,
    ExportFormatSchema,
    ExportConfigSchema,
} from './schemas.js';

// Types
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
    LedgerDocument,
    LedgerLoadResult,
    ExportFormat,
    ExportConfig,
} from './schemas.js';

// Constants
export {
    ROUNDING_ACCOUNT,
    EXPORT_FORMAT_NAMES,
    DIRECTIVE_TYPES,
    COLUMN_WIDTHS,
} from './constants.js';
