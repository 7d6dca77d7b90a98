import { describe, it, expect, vi } from 'vitest';
import { createPrinter } from '../../src/printer/dispatch.js';
import { LEDGER_RULES } from '../../src/printer/ledger.js';
import type { PrinterRules } from '../../src/printer/types.js';
import type { Directive, Transaction } from '@ledgerbridge/shared';
import { makePosting, makeStockPurchase, makeTxn } from '../helpers.js';

const identity = (txn: Transaction): Transaction => txn;

describe('Ledger printer', () => {
    const print = createPrinter(LEDGER_RULES);

    describe('Transaction', () => {
        it('renders the stock purchase with a synthesized price on the at-cost leg', () => {
            const output = print(makeStockPurchase());

            expect(output.split('\n')).toEqual([
                '2014/11/02 * Buy stock',
                '  Assets:CA:Investment:GOOG                                                  5 GOOG      {520.0 USD}      @ 520.0 USD',
                '  Expenses:Commissions                                                     9.95 USD',
                '  Assets:CA:Investment:Cash                                            -2939.46 CAD                      @ 0.8879 USD',
                '  Equity:Rounding                                                     -0.003466 USD',
                '',
            ]);
        });

        it('does not synthesize a price without an at-price posting', () => {
            const txn = makeTxn({
                postings: [
                    makePosting('Assets:Brokerage', '10', 'VEUR.L', {
                        cost: { number: '30.25', currency: 'EUR', date: null, label: null },
                    }),
                    makePosting('Assets:Cash', '-302.50', 'EUR'),
                ],
            });
            const lines = print(txn).split('\n');

            expect(lines[1]).toBe(
                '  Assets:Brokerage                                                      10 "VEUR.L"      {30.25 EUR}'
            );
            expect(lines[1]).not.toContain('@');
        });

        it('keeps an explicit price on an at-cost posting', () => {
            const txn = makeTxn({
                postings: [
                    makePosting('Assets:Brokerage', '-10', 'VEUR.L', {
                        cost: { number: '30.25', currency: 'EUR', date: null, label: null },
                        price: { number: '32.10', currency: 'EUR' },
                    }),
                    makePosting('Assets:Cash', '321.00', 'EUR'),
                    makePosting('Income:Gains', '-18.50', 'EUR'),
                ],
            });
            const lines = print(txn).split('\n');

            expect(lines[1]).toBe(
                '  Assets:Brokerage                                                     -10 "VEUR.L"      {30.25 EUR}      @ 32.10 EUR'
            );
        });

        it('renders lot date and label in the cost clause', () => {
            const txn = makeTxn({
                postings: [
                    makePosting('Assets:Brokerage', '5', 'GOOG', {
                        cost: { number: '520.0', currency: 'USD', date: '2014-10-01', label: 'lot-a' },
                    }),
                    makePosting('Assets:Cash', null),
                ],
            });
            const lines = print(txn).split('\n');

            expect(lines[1]).toBe(
                '  Assets:Brokerage                                                           5 GOOG {520.0 USD} [2014/10/01] (lot-a)'
            );
        });

        it('renders flagged and bare postings', () => {
            const txn = makeTxn({
                postings: [
                    makePosting('Expenses:Food', '100.00', 'USD'),
                    makePosting('Assets:Checking', null, 'USD', { flag: '!' }),
                ],
            });
            const lines = print(txn).split('\n');

            expect(lines[2]).toBe('  ! Assets:Checking');
        });

        it('writes sorted tag and link comments before the header', () => {
            const txn = makeTxn({
                flag: '!',
                payee: 'Cafe Mogador',
                narration: 'Lunch',
                tags: ['trip', 'food'],
                links: ['receipt-2', 'receipt-1'],
                postings: [makePosting('Expenses:Food', '12.50'), makePosting('Assets:Cash', '-12.50')],
            });
            const lines = print(txn).split('\n');

            expect(lines.slice(0, 5)).toEqual([
                ';; Tag: #food',
                ';; Tag: #trip',
                ';; Link: ^receipt-1',
                ';; Link: ^receipt-2',
                '2014/11/02 ! Cafe Mogador | Lunch',
            ]);
        });

        it('writes each tag and link once', () => {
            const txn = makeTxn({
                narration: 'Lunch',
                tags: ['trip', 'trip'],
                links: ['receipt-1', 'receipt-1'],
                postings: [makePosting('Expenses:Food', '12.50'), makePosting('Assets:Cash', '-12.50')],
            });
            const lines = print(txn).split('\n');

            expect(lines.slice(0, 3)).toEqual([';; Tag: #trip', ';; Link: ^receipt-1', '2014/11/02 * Lunch']);
        });

        it('leaves the flag column blank when there is no flag', () => {
            const txn = makeTxn({
                flag: null,
                narration: 'Transfer',
                postings: [makePosting('Assets:Savings', '5'), makePosting('Assets:Checking', '-5')],
            });
            expect(print(txn).split('\n')[0]).toBe('2014/11/02  Transfer');
        });

        it('is deterministic', () => {
            const txn = makeStockPurchase();
            expect(print(txn)).toBe(print(txn));
        });

        it('throws on a posting without an account', () => {
            const strict = createPrinter(LEDGER_RULES, { balancer: identity });
            const txn = makeTxn({ postings: [makePosting('', '1.00')] });

            expect(() => strict(txn)).toThrow('Posting has no account');
        });
    });

    describe('Residual balancer', () => {
        it('is invoked once per transaction with the rounding account', () => {
            const balancer = vi.fn(identity);
            const printWithSpy = createPrinter(LEDGER_RULES, { balancer });
            const txn = makeStockPurchase();

            printWithSpy(txn);

            expect(balancer).toHaveBeenCalledTimes(1);
            expect(balancer).toHaveBeenCalledWith(txn, 'Equity:Rounding');
        });

        it('runs before any posting is rendered', () => {
            const calls: string[] = [];
            const rules: PrinterRules = {
                ...LEDGER_RULES,
                posting: (posting, context) => {
                    calls.push(`posting:${posting.account}`);
                    return LEDGER_RULES.posting(posting, context);
                },
            };
            const balancer = vi.fn((txn: Transaction, account: string): Transaction => {
                calls.push('balance');
                return { ...txn, postings: [...txn.postings, makePosting(account, '0.01')] };
            });
            const txn = makeTxn({
                postings: [makePosting('Expenses:Food', '1.00'), makePosting('Assets:Cash', '-1.00')],
            });

            const output = createPrinter(rules, { balancer })(txn);

            expect(calls).toEqual([
                'balance',
                'posting:Expenses:Food',
                'posting:Assets:Cash',
                'posting:Equity:Rounding',
            ]);
            expect(output).toContain('Equity:Rounding');
        });

        it('is not invoked for other directives', () => {
            const balancer = vi.fn(identity);
            createPrinter(LEDGER_RULES, { balancer })({
                type: 'close',
                date: '2015-01-01',
                account: 'Assets:Checking',
            });
            expect(balancer).not.toHaveBeenCalled();
        });
    });

    describe('Other directives', () => {
        it('renders Balance as an empty record', () => {
            expect(
                print({
                    type: 'balance',
                    date: '2015-01-01',
                    account: 'Assets:Checking',
                    amount: { number: '100.00', currency: 'USD' },
                })
            ).toBe('');
        });

        it('renders Open with a commodity assertion', () => {
            expect(
                print({ type: 'open', date: '2014-01-01', account: 'Assets:Checking', currencies: ['USD', 'EUR'] })
            ).toBe(
                'account Assets:Checking                                \n' +
                '  assert commodity == "USD" | commodity == "EUR"\n'
            );
        });

        it('renders Open without currencies as a bare declaration', () => {
            expect(print({ type: 'open', date: '2014-01-01', account: 'Assets:Checking', currencies: [] })).toBe(
                'account Assets:Checking                                \n'
            );
        });

        it('renders Close, Note, Document, Pad and Event as comments', () => {
            const directives: Directive[] = [
                { type: 'close', date: '2015-01-01', account: 'Assets:Checking' },
                { type: 'note', date: '2015-01-02', account: 'Assets:Checking', comment: 'Called the bank' },
                { type: 'document', date: '2015-01-03', account: 'Assets:Checking', filename: '/docs/statement.pdf' },
                { type: 'pad', date: '2015-01-04', account: 'Assets:Checking', source_account: 'Equity:Opening-Balances' },
                { type: 'event', date: '2015-01-05', event_type: 'location', description: 'Paris, France' },
            ];

            expect(directives.map(print)).toEqual([
                ';; Close: 2015/01/01 close Assets:Checking\n',
                ';; Note: 2015/01/02 Assets:Checking Called the bank\n',
                ';; Document: 2015/01/03 Assets:Checking /docs/statement.pdf\n',
                ';; Pad: 2015/01/04 Assets:Checking Equity:Opening-Balances\n',
                ';; Event: 2015/01/05 "location" "Paris, France"\n',
            ]);
        });

        it('renders Price lines with quoted currencies', () => {
            expect(
                print({ type: 'price', date: '2014-11-02', currency: 'VEUR.L', amount: { number: '31.50', currency: 'EUR' } })
            ).toBe('P 2014/11/02 00:00:00 "VEUR.L"                  31.50 EUR\n');
            expect(
                print({ type: 'price', date: '2015-01-05', currency: 'GOOG', amount: { number: '520.00', currency: 'USD' } })
            ).toBe('P 2015/01/05 00:00:00 GOOG                   520.00 USD\n');
        });

        it('renders Commodity, Query and Custom', () => {
            expect(print({ type: 'commodity', date: '2014-01-01', currency: 'HOOL.1' })).toBe('commodity "HOOL.1"\n');
            expect(
                print({ type: 'query', date: '2014-01-01', name: 'cash', query_string: 'SELECT account' })
            ).toBe(';; Query: 2014/01/01 "cash" "SELECT account"\n');
            expect(
                print({ type: 'custom', date: '2014-01-01', custom_type: 'budget', values: ['Expenses:Food', 250, true] })
            ).toBe(';; Custom: 2014/01/01 "budget" "Expenses:Food" 250 true\n');
        });

        it('renders an unknown kind as a comment instead of failing', () => {
            const unknown: Directive = JSON.parse('{"type":"forecast","date":"2015-02-01"}');
            expect(print(unknown)).toBe(';; Unsupported: 2015/02/01 forecast\n');
        });
    });
});
