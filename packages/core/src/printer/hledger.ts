import { COLUMN_WIDTHS } from '@ledgerbridge/shared';
import type { Open, Posting } from '@ledgerbridge/shared';
import { formatAmount, formatDate, quoteCurrency } from '../utils/index.js';
import { LEDGER_RULES, postingAccountColumn, toRecord } from './ledger.js';
import type { PrinterRules } from './types.js';

/**
 * hledger posting line: amount, then a single `@` field.
 *
 * hledger wants a cost basis written as a price, so the cost shows up as
 * `@ <cost>`; lot date and label have no equivalent and are left out.
 * Uncosted postings show their explicit price in that same field.
 */
export function renderHledgerPosting(posting: Posting): string {
    const accountColumn = postingAccountColumn(posting);

    let amountStr = '';
    let priceStr = '';
    if (posting.units) {
        amountStr = formatAmount(posting.units);
        if (posting.cost) {
            priceStr = `@ ${formatAmount(posting.cost)}`;
        }
    }
    if (!priceStr && posting.price) {
        priceStr = `@ ${formatAmount(posting.price)}`;
    }

    const width = COLUMN_WIDTHS.NUMBER;
    const line =
        `  ${accountColumn.padEnd(COLUMN_WIDTHS.FLAG_ACCOUNT)}` +
        ` ${quoteCurrency(amountStr).padStart(width)}` +
        ` ${quoteCurrency(priceStr).padStart(width)}`;
    return line.trimEnd();
}

/**
 * No account declaration equivalent is honored; always a comment.
 */
export function renderHledgerOpen(entry: Open): string {
    return toRecord([`;; Open: ${formatDate(entry.date)} close ${entry.account}`]);
}

/**
 * Rules for hledger's journal format: Ledger's rules with the posting and
 * open renderers replaced.
 */
export const HLEDGER_RULES: PrinterRules = {
    ...LEDGER_RULES,
    name: 'hledger',
    posting: renderHledgerPosting,
    directives: {
        ...LEDGER_RULES.directives,
        open: renderHledgerOpen,
    },
};
