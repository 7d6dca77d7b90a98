import { Decimal } from 'decimal.js';
import type { Posting, Transaction } from '@ledgerbridge/shared';

/**
 * Decimal constructor that never rounds: products and sums keep every digit.
 * The default 20 significant digits would cut wide `units × price` products.
 */
const ExactDecimal = Decimal.clone({ precision: 1e9 });

/**
 * Weight of a posting in the currency it balances in.
 *
 * - held at cost: units × cost, in the cost currency
 * - priced: units × price, in the price currency
 * - otherwise: the units themselves
 *
 * @returns null for a bare posting (no units)
 */
export function getPostingWeight(posting: Posting): { number: Decimal; currency: string } | null {
    if (!posting.units) {
        return null;
    }
    const units = new ExactDecimal(posting.units.number);

    if (posting.cost) {
        return { number: units.times(posting.cost.number), currency: posting.cost.currency };
    }
    if (posting.price) {
        return { number: units.times(posting.price.number), currency: posting.price.currency };
    }
    return { number: units, currency: posting.units.currency };
}

/**
 * Sum of posting weights per currency, at full precision.
 * Map iteration follows the order currencies first appear in.
 */
export function computeResidual(postings: readonly Posting[]): Map<string, Decimal> {
    const residual = new Map<string, Decimal>();
    for (const posting of postings) {
        const weight = getPostingWeight(posting);
        if (!weight) continue;
        const sum = residual.get(weight.currency) ?? new ExactDecimal(0);
        residual.set(weight.currency, sum.plus(weight.number));
    }
    return residual;
}

/**
 * Insert postings on the rounding account that absorb the residual.
 *
 * Ledger derives its balancing precision from the last number of digits it
 * saw for a currency, so a transaction that balances at full precision can
 * be rejected there. Absorbing the exact residual makes it balance at any
 * precision.
 *
 * A transaction with a bare posting is returned as is: the target tool
 * fills that leg itself, so there is no residual left to absorb.
 *
 * @param transaction - Transaction to balance (not modified)
 * @param roundingAccount - Account receiving the residual
 * @returns A new transaction with one posting per unbalanced currency, or
 *   the input when it already balances
 */
export function fillResidualPosting(transaction: Transaction, roundingAccount: string): Transaction {
    if (transaction.postings.some(p => p.units === null)) {
        return transaction;
    }

    const roundingPostings: Posting[] = [];
    for (const [currency, number] of computeResidual(transaction.postings)) {
        if (number.isZero()) continue;
        roundingPostings.push({
            account: roundingAccount,
            units: { number: number.negated().toFixed(), currency },
            cost: null,
            price: null,
            flag: null,
        });
    }

    if (roundingPostings.length === 0) {
        return transaction;
    }

    return {
        ...transaction,
        postings: [...transaction.postings, ...roundingPostings],
    };
}
