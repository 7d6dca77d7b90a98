import { COLUMN_WIDTHS, ROUNDING_ACCOUNT } from '@ledgerbridge/shared';
import type {
    Balance,
    Close,
    Commodity,
    Custom,
    Document,
    Event,
    Note,
    Open,
    Pad,
    Posting,
    Price,
    Query,
    Transaction,
} from '@ledgerbridge/shared';
import { classifyPostings, needsCostAsPrice } from '../classifier/index.js';
import { flagPrefix, formatAmount, formatDate, positionStrings, quoteCurrency } from '../utils/index.js';
import type { PostingContext, PrinterRules, RenderContext } from './types.js';

/**
 * Join lines into a record, each line newline-terminated.
 */
export function toRecord(lines: string[]): string {
    return lines.map(line => `${line}\n`).join('');
}

/**
 * Left column of a posting line: flag, then the account padded to its
 * fixed width.
 */
export function postingAccountColumn(posting: Posting): string {
    if (!posting.account) {
        throw new Error('Posting has no account');
    }
    return `${flagPrefix(posting.flag)}${posting.account.padEnd(COLUMN_WIDTHS.ACCOUNT)}`;
}

/**
 * Ledger posting line: account column, then amount, cost and price right
 * justified in fixed-width fields.
 *
 * A posting held at cost gets a synthesized `@ <cost>` price when the same
 * transaction also converts currency at a price; Ledger rejects the
 * transaction otherwise.
 */
export function renderLedgerPosting(posting: Posting, { classes }: PostingContext): string {
    const accountColumn = postingAccountColumn(posting);
    const [amountStr, costStr] = positionStrings(posting);

    let priceStr = '';
    if (posting.price) {
        priceStr = `@ ${formatAmount(posting.price)}`;
    } else if (posting.cost && needsCostAsPrice(posting, classes)) {
        priceStr = `@ ${formatAmount(posting.cost)}`;
    }

    const width = COLUMN_WIDTHS.NUMBER;
    const line =
        `  ${accountColumn.padEnd(COLUMN_WIDTHS.FLAG_ACCOUNT)}` +
        ` ${quoteCurrency(amountStr).padStart(width)}` +
        ` ${quoteCurrency(costStr).padStart(width)}` +
        ` ${quoteCurrency(priceStr).padStart(width)}`;
    return line.trimEnd();
}

/**
 * Transaction: residual posting first, then tag and link comments, the
 * header line and one line per posting.
 */
export function renderTransaction(entry: Transaction, context: RenderContext): string {
    const transaction = context.balancer(entry, ROUNDING_ACCOUNT);
    const classes = classifyPostings(transaction);

    const lines: string[] = [];
    // Tags and links are sets
    for (const tag of [...new Set(transaction.tags)].sort()) {
        lines.push(`;; Tag: #${tag}`);
    }
    for (const link of [...new Set(transaction.links)].sort()) {
        lines.push(`;; Link: ^${link}`);
    }

    const description: string[] = [];
    if (transaction.payee) {
        description.push(`${transaction.payee} |`);
    }
    if (transaction.narration) {
        description.push(transaction.narration);
    }
    lines.push(`${formatDate(transaction.date)} ${transaction.flag ?? ''} ${description.join(' ')}`.trimEnd());

    for (const posting of transaction.postings) {
        lines.push(context.rules.posting(posting, { classes }));
    }

    return toRecord(lines);
}

/**
 * Ledger only has file-level assertions, not dated ones. Nothing to emit.
 */
export function renderBalance(_entry: Balance): string {
    return '';
}

export function renderNote(entry: Note): string {
    return toRecord([`;; Note: ${formatDate(entry.date)} ${entry.account} ${entry.comment}`]);
}

export function renderDocument(entry: Document): string {
    return toRecord([`;; Document: ${formatDate(entry.date)} ${entry.account} ${entry.filename}`]);
}

/**
 * Comment only. The loader already generated the padding transactions, so
 * an active directive would apply the padding twice.
 */
export function renderPad(entry: Pad): string {
    return toRecord([`;; Pad: ${formatDate(entry.date)} ${entry.account} ${entry.source_account}`]);
}

export function renderLedgerOpen(entry: Open): string {
    const lines = [`account ${entry.account.padEnd(COLUMN_WIDTHS.OPEN_ACCOUNT)}`];
    if (entry.currencies.length > 0) {
        const clauses = entry.currencies.map(currency => `commodity == "${currency}"`);
        lines.push(`  assert ${clauses.join(' | ')}`);
    }
    return toRecord(lines);
}

export function renderClose(entry: Close): string {
    return toRecord([`;; Close: ${formatDate(entry.date)} close ${entry.account}`]);
}

export function renderPrice(entry: Price): string {
    const line =
        `P ${formatDate(entry.date)} 00:00:00` +
        ` ${entry.currency.padEnd(COLUMN_WIDTHS.PRICE_CURRENCY)}` +
        ` ${formatAmount(entry.amount).padStart(COLUMN_WIDTHS.NUMBER)}`;
    return toRecord([quoteCurrency(line)]);
}

export function renderEvent(entry: Event): string {
    return toRecord([`;; Event: ${formatDate(entry.date)} "${entry.event_type}" "${entry.description}"`]);
}

export function renderCommodity(entry: Commodity): string {
    return toRecord([quoteCurrency(`commodity ${entry.currency}`)]);
}

export function renderQuery(entry: Query): string {
    return toRecord([`;; Query: ${formatDate(entry.date)} "${entry.name}" "${entry.query_string}"`]);
}

export function renderCustom(entry: Custom): string {
    const values = entry.values.map(value => (typeof value === 'string' ? `"${value}"` : String(value)));
    return toRecord([[`;; Custom: ${formatDate(entry.date)} "${entry.custom_type}"`, ...values].join(' ')]);
}

/**
 * Rules for Ledger's journal format.
 */
export const LEDGER_RULES: PrinterRules = {
    name: 'ledger',
    posting: renderLedgerPosting,
    directives: {
        transaction: renderTransaction,
        balance: renderBalance,
        open: renderLedgerOpen,
        close: renderClose,
        note: renderNote,
        document: renderDocument,
        pad: renderPad,
        price: renderPrice,
        event: renderEvent,
        commodity: renderCommodity,
        query: renderQuery,
        custom: renderCustom,
    },
};
