import type { Posting } from '@ledgerbridge/shared';

/**
 * How a posting is valued.
 * - simple: units only
 * - at_price: converted at an explicit rate, no cost basis
 * - at_cost: held at cost (a cost basis wins over any price)
 */
export type PostingClass = 'simple' | 'at_price' | 'at_cost';

/**
 * A transaction's postings split by class, each in original order.
 */
export interface PostingClasses {
    simple: Posting[];
    atPrice: Posting[];
    atCost: Posting[];
}
