/**
 * Currency quoting for Ledger-family syntax.
 *
 * Both target grammars read a bare token as a commodity only when it looks
 * like a symbol. A commodity containing a digit or a period has to be
 * wrapped in double quotes, otherwise it is read as part of a number.
 */

/**
 * Commodity-like token: an uppercase letter, up to 10 symbol characters,
 * and a closing uppercase letter or digit.
 */
const CURRENCY_TOKEN = /\b([A-Z][A-Z0-9'._-]{0,10}[A-Z0-9])\b/g;

const NEEDS_QUOTES = /[0-9.]/;

/**
 * Quote all the currencies with numbers or periods in the given text.
 *
 * Tokens already enclosed in double quotes are left alone, so the
 * transform can be applied more than once.
 *
 * @param text - Already-formatted amount, cost or price text
 * @returns The text with those commodities surrounded with quotes
 */
export function quoteCurrency(text: string): string {
    return text.replace(CURRENCY_TOKEN, (token: string, _group: string, offset: number) => {
        if (!NEEDS_QUOTES.test(token)) {
            return token;
        }
        const before = text.charAt(offset - 1);
        const after = text.charAt(offset + token.length);
        if (before === '"' && after === '"') {
            return token;
        }
        return `"${token}"`;
    });
}
