/**
 * Constants for ledgerbridge.
 */

/**
 * Account that absorbs the residual left after the target tool's rounding.
 * Every rendered transaction is balanced against this account.
 */
export const ROUNDING_ACCOUNT = 'Equity:Rounding';

/**
 * Output formats the exporter knows how to produce.
 */
export const EXPORT_FORMAT_NAMES = ['ledger', 'hledger'] as const;

/**
 * Directive kinds accepted in a ledger document.
 */
export const DIRECTIVE_TYPES = [
    'transaction',
    'balance',
    'open',
    'close',
    'note',
    'document',
    'pad',
    'price',
    'event',
    'commodity',
    'query',
    'custom',
] as const;

/**
 * Column widths of the rendered text.
 *
 * NOTE: these are part of the contract with the Ledger and hledger
 * parsers, not cosmetics. Changing them changes the output format.
 */
export const COLUMN_WIDTHS = {
    /** Account name, left-justified, after the optional flag prefix */
    ACCOUNT: 62,
    /** Flag prefix + account, left-justified */
    FLAG_ACCOUNT: 64,
    /** Each right-justified amount / cost / price field */
    NUMBER: 16,
    /** Account name on an `account` declaration */
    OPEN_ACCOUNT: 47,
    /** Commodity on a `P` price line */
    PRICE_CURRENCY: 16,
} as const;
