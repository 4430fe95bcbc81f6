/**
 * ISO 4217 minor-unit exponents.
 * Only currencies whose exponent differs from 2 are listed; every other
 * well-formed code uses two decimals.
 */

export type Currency = string;

const ZERO_DECIMAL_CURRENCIES: ReadonlySet<string> = new Set([
    'BIF', 'CLP', 'DJF', 'GNF', 'ISK', 'JPY', 'KMF', 'KRW', 'PYG',
    'RWF', 'UGX', 'UYI', 'VND', 'VUV', 'XAF', 'XOF', 'XPF'
]);

const THREE_DECIMAL_CURRENCIES: ReadonlySet<string> = new Set([
    'BHD', 'IQD', 'JOD', 'KWD', 'LYD', 'OMR', 'TND'
]);

const FOUR_DECIMAL_CURRENCIES: ReadonlySet<string> = new Set(['CLF', 'UYW']);

// Precious metals, fund units and testing codes carry no payable minor unit.
const NON_PAYABLE_CURRENCIES: ReadonlySet<string> = new Set([
    'XAU', 'XAG', 'XPD', 'XPT', 'XDR', 'XSU', 'XUA',
    'XBA', 'XBB', 'XBC', 'XBD', 'XTS', 'XXX'
]);

const CURRENCY_CODE = /^[A-Z]{3}$/;

export type CurrencyExponent = 0 | 2 | 3 | 4;

/**
 * Returns the exponent for a payable currency, or undefined when the code is
 * malformed or names a non-payable unit.
 */
export function currencyExponent(currency: Currency): CurrencyExponent | undefined {
    if (!CURRENCY_CODE.test(currency) || NON_PAYABLE_CURRENCIES.has(currency)) {
        return undefined;
    }
    if (ZERO_DECIMAL_CURRENCIES.has(currency)) return 0;
    if (THREE_DECIMAL_CURRENCIES.has(currency)) return 3;
    if (FOUR_DECIMAL_CURRENCIES.has(currency)) return 4;
    return 2;
}

export function isZeroDecimalCurrency(currency: Currency): boolean {
    return currencyExponent(currency) === 0;
}
