/**
 * Zod schemas for ledger directives.
 *
 * IMPORTANT: Decimal values are stored as strings in schemas.
 * The string as written is the number's canonical rendering ("520.0" stays
 * "520.0"). Convert to Decimal at computation boundaries only.
 */

import { z } from 'zod';
import { EXPORT_FORMAT_NAMES } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Decimal amount as string (never native number for money).
 * Plain YAML/JSON numbers are accepted and stringified; quote them in the
 * source document to keep trailing zeros.
 */
const decimalString = z.preprocess(
    (value) => (typeof value === 'number' ? String(value) : value),
    z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string')
);

const currency = z.string().min(1);

const account = z.string().min(1);

/**
 * Single-character flag, e.g. '*' or '!'.
 */
const flag = z.string().length(1);

// ============================================================================
// Amount Schemas
// ============================================================================

export const AmountSchema = z.object({
    number: decimalString,
    currency,
});

export type Amount = z.infer<typeof AmountSchema>;

/**
 * Cost basis of a held lot, with optional acquisition info.
 */
export const CostSchema = z.object({
    number: decimalString,
    currency,
    date: isoDateString.nullable().default(null),
    label: z.string().nullable().default(null),
});

export type Cost = z.infer<typeof CostSchema>;

// ============================================================================
// Transaction Schemas
// ============================================================================

/**
 * One account leg of a transaction.
 *
 * `units` + `cost` form the position. A posting without units renders as a
 * bare account line and is left for the target tool to infer.
 */
export const PostingSchema = z
    .object({
        account,
        units: AmountSchema.nullable().default(null),
        cost: CostSchema.nullable().default(null),
        price: AmountSchema.nullable().default(null),
        flag: flag.nullable().default(null),
    })
    .refine((posting) => posting.cost === null || posting.units !== null, {
        message: 'A posting held at cost must have units',
        path: ['cost'],
    });

export type Posting = z.infer<typeof PostingSchema>;

export const TransactionSchema = z.object({
    type: z.literal('transaction'),
    date: isoDateString,
    flag: flag.nullable().default(null),
    payee: z.string().nullable().default(null),
    narration: z.string().default(''),
    tags: z.array(z.string().min(1)).default([]),
    links: z.array(z.string().min(1)).default([]),
    postings: z.array(PostingSchema).min(1),
});

export type Transaction = z.infer<typeof TransactionSchema>;

// ============================================================================
// Other Directive Schemas
// ============================================================================

export const BalanceSchema = z.object({
    type: z.literal('balance'),
    date: isoDateString,
    account,
    amount: AmountSchema,
});

export type Balance = z.infer<typeof BalanceSchema>;

export const OpenSchema = z.object({
    type: z.literal('open'),
    date: isoDateString,
    account,
    currencies: z.array(currency).default([]),
});

export type Open = z.infer<typeof OpenSchema>;

export const CloseSchema = z.object({
    type: z.literal('close'),
    date: isoDateString,
    account,
});

export type Close = z.infer<typeof CloseSchema>;

export const NoteSchema = z.object({
    type: z.literal('note'),
    date: isoDateString,
    account,
    comment: z.string(),
});

export type Note = z.infer<typeof NoteSchema>;

export const DocumentSchema = z.object({
    type: z.literal('document'),
    date: isoDateString,
    account,
    filename: z.string().min(1),
});

export type Document = z.infer<typeof DocumentSchema>;

export const PadSchema = z.object({
    type: z.literal('pad'),
    date: isoDateString,
    account,
    source_account: account,
});

export type Pad = z.infer<typeof PadSchema>;

export const PriceSchema = z.object({
    type: z.literal('price'),
    date: isoDateString,
    currency,
    amount: AmountSchema,
});

export type Price = z.infer<typeof PriceSchema>;

export const EventSchema = z.object({
    type: z.literal('event'),
    date: isoDateString,
    event_type: z.string().min(1),
    description: z.string(),
});

export type Event = z.infer<typeof EventSchema>;

export const CommoditySchema = z.object({
    type: z.literal('commodity'),
    date: isoDateString,
    currency,
});

export type Commodity = z.infer<typeof CommoditySchema>;

export const QuerySchema = z.object({
    type: z.literal('query'),
    date: isoDateString,
    name: z.string().min(1),
    query_string: z.string(),
});

export type Query = z.infer<typeof QuerySchema>;

export const CustomSchema = z.object({
    type: z.literal('custom'),
    date: isoDateString,
    custom_type: z.string().min(1),
    values: z.array(z.union([z.string(), z.number(), z.boolean()])).default([]),
});

export type Custom = z.infer<typeof CustomSchema>;

// ============================================================================
// Directive Union
// ============================================================================

export const DirectiveSchema = z.discriminatedUnion('type', [
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
]);

export type Directive = z.infer<typeof DirectiveSchema>;

/**
 * Directive kind -> directive type. Used to key per-kind renderers.
 */
export type DirectiveMap = { [D in Directive as D['type']]: D };

export type DirectiveType = keyof DirectiveMap;

/**
 * Top-level shape of a ledger document: a bare list of directives or a
 * wrapped `{ directives: [...] }` object. Entries are validated one by one.
 */
export const LedgerDocumentSchema = z.union([
    z.array(z.unknown()),
    z.object({ directives: z.array(z.unknown()) }),
]);

export type LedgerDocument = z.infer<typeof LedgerDocumentSchema>;

// ============================================================================
// Configuration Schemas
// ============================================================================

export const ExportFormatSchema = z.enum(EXPORT_FORMAT_NAMES);

export type ExportFormat = z.infer<typeof ExportFormatSchema>;

/**
 * Contents of `ledgerbridge.yaml`.
 */
export const ExportConfigSchema = z.object({
    format: ExportFormatSchema.default('ledger'),
    output: z.string().min(1).optional(),
});

export type ExportConfig = z.infer<typeof ExportConfigSchema>;

/**
 * Result of loading a ledger document.
 * Loaders return warnings as data; the caller decides how to report them.
 */
export interface LedgerLoadResult {
    directives: Directive[];
    warnings: string[];
}
