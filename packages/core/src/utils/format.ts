import type { Amount, Cost, Posting } from '@ledgerbridge/shared';

/**
 * Render an ISO date (YYYY-MM-DD) the way both target tools write it.
 */
export function formatDate(isoDate: string): string {
    return isoDate.replace(/-/g, '/');
}

/**
 * `<number> <currency>`, number exactly as stored.
 */
export function formatAmount(amount: Pick<Amount, 'number' | 'currency'>): string {
    return `${amount.number} ${amount.currency}`;
}

/**
 * Ledger lot annotation: `{<cost>}`, then ` [<date>]` and ` (<label>)`
 * when the lot carries acquisition info.
 */
export function formatCostClause(cost: Cost): string {
    let clause = `{${formatAmount(cost)}}`;
    if (cost.date) {
        clause += ` [${formatDate(cost.date)}]`;
    }
    if (cost.label) {
        clause += ` (${cost.label})`;
    }
    return clause;
}

/**
 * Two-part rendering of a posting's position: the units and, when held at
 * cost, the bracketed cost clause. Both are empty for a bare posting.
 */
export function positionStrings(posting: Posting): [amount: string, cost: string] {
    if (!posting.units) {
        return ['', ''];
    }
    return [formatAmount(posting.units), posting.cost ? formatCostClause(posting.cost) : ''];
}

/**
 * Leading flag column of a posting: `<flag> ` or nothing.
 */
export function flagPrefix(flag: string | null): string {
    return flag ? `${flag} ` : '';
}
