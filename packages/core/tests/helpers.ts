import type { Posting, Transaction } from '@ledgerbridge/shared';

/**
 * Test helpers for building directives.
 */

export function makePosting(
    account: string,
    number: string | null,
    currency = 'USD',
    overrides: Partial<Posting> = {}
): Posting {
    return {
        account,
        units: number === null ? null : { number, currency },
        cost: null,
        price: null,
        flag: null,
        ...overrides,
    };
}

export function makeTxn(overrides: Partial<Transaction>): Transaction {
    return {
        type: 'transaction',
        date: '2014-11-02',
        flag: '*',
        payee: null,
        narration: 'Test Transaction',
        tags: [],
        links: [],
        postings: [],
        ...overrides,
    };
}

/**
 * Five shares bought at cost with commissions, paid from a CAD account at a
 * USD conversion rate.
 */
export function makeStockPurchase(): Transaction {
    return makeTxn({
        narration: 'Buy stock',
        postings: [
            makePosting('Assets:CA:Investment:GOOG', '5', 'GOOG', {
                cost: { number: '520.0', currency: 'USD', date: null, label: null },
            }),
            makePosting('Expenses:Commissions', '9.95', 'USD'),
            makePosting('Assets:CA:Investment:Cash', '-2939.46', 'CAD', {
                price: { number: '0.8879', currency: 'USD' },
            }),
        ],
    });
}
