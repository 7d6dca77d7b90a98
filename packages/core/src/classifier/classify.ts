import type { Posting, Transaction } from '@ledgerbridge/shared';
import type { PostingClass, PostingClasses } from './types.js';

/**
 * Classify a single posting. Price is only consulted when there is no cost.
 */
export function classifyPosting(posting: Posting): PostingClass {
    if (posting.cost) {
        return 'at_cost';
    }
    if (posting.price) {
        return 'at_price';
    }
    return 'simple';
}

/**
 * Split up the postings of a transaction by simple, at-price, at-cost.
 *
 * Pure: the transaction is not modified and the buckets keep the
 * postings' relative order.
 *
 * @param transaction - Transaction (or anything carrying postings)
 * @returns Three disjoint buckets that together hold every posting
 */
export function classifyPostings(transaction: Pick<Transaction, 'postings'>): PostingClasses {
    const classes: PostingClasses = { simple: [], atPrice: [], atCost: [] };

    for (const posting of transaction.postings) {
        switch (classifyPosting(posting)) {
            case 'at_cost':
                classes.atCost.push(posting);
                break;
            case 'at_price':
                classes.atPrice.push(posting);
                break;
            default:
                classes.simple.push(posting);
        }
    }

    return classes;
}

/**
 * Whether a posting must carry a synthesized `@ <cost>` price.
 *
 * Ledger only accepts an at-cost leg next to a currency conversion when the
 * at-cost leg states its rate explicitly. This depends on the sibling
 * postings, so it takes the whole transaction's classes.
 */
export function needsCostAsPrice(posting: Posting, classes: PostingClasses): boolean {
    return posting.price === null && posting.cost !== null && classes.atPrice.length > 0;
}
