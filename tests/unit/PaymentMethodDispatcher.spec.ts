import { describe, it } from 'node:test';
import assert from 'node:assert';
import { novapayConnector } from '../../libs/connectors/novapay/novapayConnector.js';
import { settlelineConnector } from '../../libs/connectors/settleline/settlelineConnector.js';
import { MissingRequiredFieldError, NotSupportedError } from '../../libs/errors/connectorErrors.js';
import { PaymentMethodDispatcher, type FlowContext } from '../../libs/paymentMethods/dispatcher.js';
import {
    PAYMENT_METHOD_VARIANTS,
    paymentMethodLabel,
    type PaymentMethodData
} from '../../libs/paymentMethods/paymentMethodData.js';
import { TEST_CARD } from '../helpers/fixtures.js';
import { PAYMENT_METHOD_SAMPLES } from '../helpers/paymentMethodSamples.js';

const novapay = new PaymentMethodDispatcher('novapay', novapayConnector.paymentMethods);
const settleline = new PaymentMethodDispatcher('settleline', settlelineConnector.paymentMethods);

const flowContext = (connector: string): FlowContext => ({
    connector,
    flow: 'Authorize',
    amount: 1050,
    currency: 'EUR',
    captureMethod: 'automatic'
});

describe('PaymentMethodDispatcher', () => {
    it('should label payment methods by family and variant', () => {
        assert.strictEqual(paymentMethodLabel({ type: 'card', card: TEST_CARD }), 'card');
        assert.strictEqual(paymentMethodLabel({ type: 'wallet', wallet: { type: 'mb_way', phoneNumber: '+351900000000' } }), 'wallet.mb_way');
        assert.deepStrictEqual(PAYMENT_METHOD_VARIANTS.bank_debit, ['ach', 'sepa', 'bacs', 'becs']);
    });

    it('should build the card fragment a gateway expects', () => {
        const result = novapay.dispatch({ type: 'card', card: { ...TEST_CARD, holderName: 'Test Holder' } }, flowContext('novapay'));
        assert.deepStrictEqual(result, {
            ok: true,
            value: {
                type: 'card',
                card: {
                    number: '4111111111111111',
                    exp_month: '3',
                    exp_year: '2030',
                    cvc: '123',
                    holder_name: 'Test Holder'
                }
            }
        });
    });

    it('should refuse an unoffered family with NotSupported naming method and connector', () => {
        const result = novapay.dispatch({ type: 'crypto', crypto: { payCurrency: 'BTC' } }, flowContext('novapay'));

        assert.ok(!result.ok);
        assert.ok(result.error instanceof NotSupportedError);
        assert.strictEqual(result.error.message, 'Payment method crypto is not supported by novapay');
    });

    it('should dispatch wallet variants individually', () => {
        const applePay = novapay.dispatch({
            type: 'wallet',
            wallet: {
                type: 'apple_pay',
                paymentData: 'dGVzdC10b2tlbg==',
                paymentMethod: { displayName: 'Visa 0000', network: 'Visa', type: 'debit' },
                transactionIdentifier: 'apple-txn-1'
            }
        }, flowContext('novapay'));
        assert.deepStrictEqual(applePay, {
            ok: true,
            value: {
                type: 'apple_pay',
                apple_pay: { payment_data: 'dGVzdC10b2tlbg==', network: 'Visa', transaction_id: 'apple-txn-1' }
            }
        });

        const samsungPay = novapay.dispatch({ type: 'wallet', wallet: { type: 'samsung_pay', token: 'test-token' } }, flowContext('novapay'));
        assert.ok(!samsungPay.ok);
        assert.strictEqual(samsungPay.error.message, 'Payment method wallet.samsung_pay is not supported by novapay');
    });

    it('should report a blank required value as a missing field', () => {
        const result = novapay.dispatch({ type: 'wallet', wallet: { type: 'mb_way', phoneNumber: '  ' } }, flowContext('novapay'));

        assert.ok(!result.ok);
        assert.ok(result.error instanceof MissingRequiredFieldError);
        assert.strictEqual(result.error.fieldName, 'wallet.mb_way.phoneNumber');
    });

    it('should throw the dispatch error from dispatchOrThrow', () => {
        assert.throws(
            () => novapay.dispatchOrThrow({ type: 'bank_debit', bankDebit: { type: 'sepa', iban: 'DE00TEST0000000000' } }, flowContext('novapay')),
            /Payment method bank_debit.sepa is not supported by novapay/
        );
    });

    it('should build form fields for settleline cards, omitting absent values', () => {
        assert.deepStrictEqual(settleline.dispatchOrThrow({ type: 'card', card: TEST_CARD }, flowContext('settleline')), {
            method: 'card',
            'card[number]': '4111111111111111',
            'card[expiry]': '03/30',
            'card[cvc]': '123'
        });
    });

    it('should route bank debit variants for settleline', () => {
        assert.deepStrictEqual(
            settleline.dispatchOrThrow({ type: 'bank_debit', bankDebit: { type: 'sepa', iban: 'DE00TEST0000000000' } }, flowContext('settleline')),
            { method: 'sepa_debit', iban: 'DE00TEST0000000000' }
        );
        assert.deepStrictEqual(
            settleline.dispatchOrThrow({
                type: 'bank_debit',
                bankDebit: { type: 'ach', accountNumber: '000123456789', routingNumber: '110000000', bankAccountHolderName: 'Test Holder' }
            }, flowContext('settleline')),
            { method: 'ach_debit', account_number: '000123456789', routing_number: '110000000', account_holder: 'Test Holder' }
        );

        const bacs = settleline.dispatch({
            type: 'bank_debit',
            bankDebit: { type: 'bacs', accountNumber: '00012345', sortCode: '000000' }
        }, flowContext('settleline'));
        assert.ok(!bacs.ok);
        assert.strictEqual(bacs.error.message, 'Payment method bank_debit.bacs is not supported by settleline');
    });

    it('should require a BLIK code', () => {
        const result = settleline.dispatch({ type: 'bank_redirect', bankRedirect: { type: 'blik', blikCode: '' } }, flowContext('settleline'));

        assert.ok(!result.ok);
        assert.ok(result.error instanceof MissingRequiredFieldError);
        assert.strictEqual(result.error.message, 'Missing required field bankRedirect.blik.blikCode for settleline');
    });

    it('should never mutate the payment-method data', () => {
        const voucher: PaymentMethodData = { type: 'voucher', voucher: { type: 'boleto', socialSecurityNumber: '00000000000' } };
        const data = Object.freeze(voucher);

        assert.deepStrictEqual(settleline.dispatchOrThrow(data, flowContext('settleline')), { method: 'boleto', tax_id: '00000000000' });
        assert.deepStrictEqual(data, { type: 'voucher', voucher: { type: 'boleto', socialSecurityNumber: '00000000000' } });
    });

    it('should refuse every family settleline does not offer', () => {
        const unsupported: PaymentMethodData[] = [
            { type: 'wallet', wallet: { type: 'paypal_redirect' } },
            { type: 'pay_later', payLater: { type: 'affirm_redirect' } },
            { type: 'bank_transfer', bankTransfer: { type: 'pix' } },
            { type: 'crypto', crypto: {} },
            { type: 'gift_card', giftCard: { type: 'pay_safe_card' } },
            { type: 'card_redirect', cardRedirect: { type: 'knet' } }
        ];

        for (const data of unsupported) {
            const result = settleline.dispatch(data, flowContext('settleline'));
            assert.ok(!result.ok);
            assert.strictEqual(result.error.code, 'NOT_SUPPORTED');
        }
    });

    it('should answer every payment-method variant with a fragment or an explicit refusal', () => {
        const expectedLabels = Object.entries(PAYMENT_METHOD_VARIANTS)
            .flatMap(([family, variants]) => variants.length === 0 ? [family] : variants.map(variant => `${family}.${variant}`))
            .sort();
        assert.deepStrictEqual(PAYMENT_METHOD_SAMPLES.map(paymentMethodLabel).sort(), expectedLabels);

        for (const dispatcher of [novapay, settleline]) {
            for (const data of PAYMENT_METHOD_SAMPLES) {
                const result = dispatcher.dispatch(data, flowContext(dispatcher.connector));
                if (!result.ok) {
                    assert.strictEqual(result.error.code, 'NOT_SUPPORTED');
                    assert.strictEqual(
                        result.error.message,
                        `Payment method ${paymentMethodLabel(data)} is not supported by ${dispatcher.connector}`
                    );
                }
            }
        }
    });
});
