import type { Transaction } from '@ledgerbridge/shared';

/**
 * Returns a copy of the transaction with a posting on `roundingAccount`
 * that absorbs whatever residual the postings leave, or the transaction
 * itself when there is nothing to absorb.
 */
export type ResidualBalancer = (transaction: Transaction, roundingAccount: string) => Transaction;
