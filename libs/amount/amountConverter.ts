/**
 * Conversion between the canonical minor-unit amount and the representation
 * a gateway expects.
 *
 * Every function here is pure: the same amount, currency and unit always
 * produce the same representation, which keeps retried requests byte-equal.
 */

import { AmountConversionError } from '../errors/connectorErrors.js';
import { currencyExponent, type Currency, type CurrencyExponent } from './currency.js';

/** Integer amount in the currency's smallest unit (cents, yen, fils). */
export type MinorUnit = number;

export type UnitKind = 'MinorInteger' | 'MinorString' | 'MajorString' | 'MajorFloat';

export const UNIT_KINDS: readonly UnitKind[] = ['MinorInteger', 'MinorString', 'MajorString', 'MajorFloat'];

export interface UnitRepresentation {
    MinorInteger: number;
    MinorString: string;
    MajorString: string;
    MajorFloat: number;
}

export interface UnitKindMetadata {
    /** Whether convertBack(convert(x)) === x for every valid minor amount */
    readonly lossless: boolean;
    readonly note: string;
}

export const UNIT_KIND_METADATA: Record<UnitKind, UnitKindMetadata> = {
    MinorInteger: { lossless: true, note: 'Safe integer, unchanged' },
    MinorString: { lossless: true, note: 'Decimal digits of the minor amount, no separators' },
    MajorString: { lossless: true, note: 'Fixed-point decimal with exactly the currency exponent of fraction digits' },
    MajorFloat: {
        lossless: false,
        note: 'Binary floating point; exact round trips hold while the amount has at most 15 significant digits'
    }
};

export interface AmountConverter<U extends UnitKind> {
    readonly unit: U;
    convert(amount: MinorUnit, currency: Currency): UnitRepresentation[U];
    convertBack(value: UnitRepresentation[U], currency: Currency): MinorUnit;
}

function exponentFor(currency: Currency, unit: UnitKind): CurrencyExponent {
    const exponent = currencyExponent(currency);
    if (exponent === undefined) {
        throw new AmountConversionError(`Unsupported currency ${currency} for ${unit}`, currency, unit);
    }
    return exponent;
}

function assertMinorAmount(amount: MinorUnit, currency: Currency, unit: UnitKind): void {
    if (!Number.isSafeInteger(amount) || amount < 0) {
        throw new AmountConversionError(
            `Amount ${amount} is not a non-negative integer number of minor units`,
            currency,
            unit
        );
    }
}

function toSafeMinor(value: number, currency: Currency, unit: UnitKind): MinorUnit {
    if (!Number.isSafeInteger(value) || value < 0) {
        throw new AmountConversionError(`Converted amount ${value} is outside the supported range`, currency, unit);
    }
    return value;
}

const MINOR_DIGITS = /^\d+$/;
const MAJOR_DECIMAL = /^(\d+)(?:\.(\d+))?$/;

export const MinorIntegerConverter: AmountConverter<'MinorInteger'> = {
    unit: 'MinorInteger',
    convert(amount, currency) {
        exponentFor(currency, 'MinorInteger');
        assertMinorAmount(amount, currency, 'MinorInteger');
        return amount;
    },
    convertBack(value, currency) {
        exponentFor(currency, 'MinorInteger');
        return toSafeMinor(value, currency, 'MinorInteger');
    }
};

export const MinorStringConverter: AmountConverter<'MinorString'> = {
    unit: 'MinorString',
    convert(amount, currency) {
        exponentFor(currency, 'MinorString');
        assertMinorAmount(amount, currency, 'MinorString');
        return String(amount);
    },
    convertBack(value, currency) {
        exponentFor(currency, 'MinorString');
        if (!MINOR_DIGITS.test(value)) {
            throw new AmountConversionError(`"${value}" is not a minor-unit amount`, currency, 'MinorString');
        }
        return toSafeMinor(Number(value), currency, 'MinorString');
    }
};

export const MajorStringConverter: AmountConverter<'MajorString'> = {
    unit: 'MajorString',
    convert(amount, currency) {
        const exponent = exponentFor(currency, 'MajorString');
        assertMinorAmount(amount, currency, 'MajorString');
        if (exponent === 0) {
            return String(amount);
        }
        const digits = String(amount).padStart(exponent + 1, '0');
        return `${digits.slice(0, -exponent)}.${digits.slice(-exponent)}`;
    },
    convertBack(value, currency) {
        const exponent = exponentFor(currency, 'MajorString');
        const match = MAJOR_DECIMAL.exec(value.trim());
        if (!match) {
            throw new AmountConversionError(`"${value}" is not a decimal amount`, currency, 'MajorString');
        }
        const [, whole, fraction = ''] = match;
        const significant = fraction.slice(0, exponent);
        const excess = fraction.slice(exponent);
        if (/[^0]/.test(excess)) {
            throw new AmountConversionError(
                `"${value}" has more fraction digits than ${currency} allows (${exponent})`,
                currency,
                'MajorString'
            );
        }
        return toSafeMinor(Number(`${whole}${significant.padEnd(exponent, '0')}`), currency, 'MajorString');
    }
};

export const MajorFloatConverter: AmountConverter<'MajorFloat'> = {
    unit: 'MajorFloat',
    convert(amount, currency) {
        const exponent = exponentFor(currency, 'MajorFloat');
        assertMinorAmount(amount, currency, 'MajorFloat');
        return amount / 10 ** exponent;
    },
    convertBack(value, currency) {
        const exponent = exponentFor(currency, 'MajorFloat');
        if (!Number.isFinite(value)) {
            throw new AmountConversionError(`${value} is not a finite amount`, currency, 'MajorFloat');
        }
        const scaled = value * 10 ** exponent;
        const minor = Math.round(scaled);
        const tolerance = Math.max(1e-6, Math.abs(scaled) * Number.EPSILON * 8);
        if (Math.abs(scaled - minor) > tolerance) {
            throw new AmountConversionError(
                `${value} cannot be expressed in whole ${currency} minor units`,
                currency,
                'MajorFloat'
            );
        }
        return toSafeMinor(minor, currency, 'MajorFloat');
    }
};

const CONVERTERS: { [U in UnitKind]: AmountConverter<U> } = {
    MinorInteger: MinorIntegerConverter,
    MinorString: MinorStringConverter,
    MajorString: MajorStringConverter,
    MajorFloat: MajorFloatConverter
};

export function getAmountConverter<U extends UnitKind>(unit: U): AmountConverter<U> {
    return CONVERTERS[unit];
}

/**
 * convert(amount, currency, unit) from the connector contract.
 */
export function convertAmount<U extends UnitKind>(amount: MinorUnit, currency: Currency, unit: U): UnitRepresentation[U] {
    return getAmountConverter(unit).convert(amount, currency);
}

export function convertAmountBack<U extends UnitKind>(value: UnitRepresentation[U], currency: Currency, unit: U): MinorUnit {
    return getAmountConverter(unit).convertBack(value, currency);
}
