/**
 * settleline: form-encoded API with signed requests and amounts as major-unit
 * decimal strings.
 *
 * Transactions answer with an `approved` flag and an optional result code
 * rather than a status word; refunds answer with a numeric code. There is no
 * refund lookup, so RSync is not offered.
 */

import { MajorStringConverter } from '../../amount/amountConverter.js';
import { requireField } from '../../errors/connectorErrors.js';
import type { RawError } from '../../errors/errorTaxonomyMapper.js';
import { jsonErrorParser } from '../../flows/commonCapabilities.js';
import { ConnectorAdapter, type ConnectorContext, type ConnectorDefinition } from '../../flows/connectorAdapter.js';
import { flowsFor, type PaymentOutcome } from '../../flows/flowDefinition.js';
import { Body } from '../../flows/http.js';
import { ok, type Result } from '../../flows/result.js';
import { missingField, notSupported, supported } from '../../paymentMethods/dispatcher.js';
import type { CardDetails } from '../../paymentMethods/paymentMethodData.js';
import { failureStatusFor, rawStatus, successStatusFor } from '../../status/statusReconciler.js';
import { timestampedHmacScheme } from '../../webhooks/signature.js';
import type { ConnectorPlugin } from '../registry.js';
import {
    SettlelineErrorSchema,
    SettlelineRefundSchema,
    SettlelineTransactionSchema,
    SettlelineTransactionStateSchema,
    SettlelineVoidSchema,
    SettlelineWebhookSchema,
    type SettlelineError,
    type SettlelinePaymentFields,
    type SettlelineTransaction,
    type SettlelineWebhook
} from './settlelineSchemas.js';

type SettlelineContext = ConnectorContext<'MajorString', SettlelinePaymentFields>;

const define = flowsFor<SettlelineContext>();

/** Drops absent values; form bodies carry strings only. */
function formFields(fields: Readonly<Record<string, string | undefined>>): Record<string, string> {
    const present: Record<string, string> = {};
    for (const [key, value] of Object.entries(fields)) {
        if (value !== undefined) present[key] = value;
    }
    return present;
}

function cardFields(card: CardDetails): SettlelinePaymentFields {
    return formFields({
        method: 'card',
        'card[number]': card.cardNumber,
        'card[expiry]': `${card.expiryMonth.padStart(2, '0')}/${card.expiryYear.slice(-2)}`,
        'card[cvc]': card.cvc,
        'card[holder]': card.holderName
    });
}

function toRawError(error: SettlelineError): RawError {
    return {
        code: error.error_code,
        message: error.error_message,
        connectorTransactionId: error.transaction_id,
        networkDeclineCode: error.scheme_response_code
    };
}

function transactionOutcome(transaction: SettlelineTransaction): Result<PaymentOutcome, RawError> {
    return ok({
        rawStatus: rawStatus.flag(transaction.approved, transaction.result_code),
        connectorTransactionId: transaction.transaction_id,
        redirection: transaction.redirect_url
            ? { endpoint: transaction.redirect_url, method: 'GET', formFields: {} }
            : undefined
    });
}

function transactionPath(connectorTransactionId: string | undefined, context: SettlelineContext, suffix = ''): string {
    const id = requireField(connectorTransactionId, 'connectorTransactionId', context.connector);
    return `/transactions/${encodeURIComponent(id)}${suffix}`;
}

export const settlelineConnector: ConnectorDefinition<'MajorString', SettlelinePaymentFields, SettlelineWebhook> = {
    id: 'settleline',
    displayName: 'Settleline',
    amountUnit: 'MajorString',

    statusVocabulary: {
        payment: {
            text: {
                authorised: 'Authorized',
                settling: 'CaptureInitiated',
                settled: 'Charged',
                sent_for_settlement: 'Charged',
                partially_settled: 'PartialCharged',
                voided: 'Voided',
                refused: failureStatusFor
            },
            flag: {
                success: successStatusFor,
                failure: failureStatusFor,
                reasons: {
                    // 3-D Secure challenge outstanding
                    '10': 'AuthenticationPending',
                    '20': 'Pending'
                }
            }
        },
        refund: {
            codes: {
                '0': 'Success',
                '1': 'Pending',
                '2': 'ManualReview',
                '3': 'Failure'
            }
        }
    },

    errorCodes: {
        '1001': 'AuthenticationFailed',
        '2001': 'InsufficientFunds',
        '2002': 'CardDeclined',
        '3001': { kind: 'AlreadyProcessed', attemptStatus: 'Charged' },
        '3002': { kind: 'AlreadyProcessed', attemptStatus: 'Voided' },
        '4001': 'Validation',
        '4029': 'RateLimited',
        '5001': 'Transient'
    },

    parseError: jsonErrorParser('settleline', SettlelineErrorSchema, toRawError),

    paymentMethods: {
        card: card => supported(cardFields(card)),
        cardRedirect: notSupported,
        wallet: notSupported,
        payLater: notSupported,
        bankRedirect: {
            ideal: ideal => supported(formFields({ method: 'ideal', bank: ideal.bankName })),
            sofort: sofort => supported(formFields({
                method: 'sofort',
                country: sofort.country,
                language: sofort.preferredLanguage
            })),
            blik: (blik, context) => blik.blikCode.trim() === ''
                ? missingField('bankRedirect.blik.blikCode', context)
                : supported({ method: 'blik', blik_code: blik.blikCode }),
            giropay: notSupported,
            eps: notSupported,
            bancontact_card: notSupported,
            trustly: notSupported,
            przelewy24: notSupported,
            open_banking_uk: notSupported
        },
        bankTransfer: notSupported,
        bankDebit: {
            ach: ach => supported(formFields({
                method: 'ach_debit',
                account_number: ach.accountNumber,
                routing_number: ach.routingNumber,
                account_holder: ach.bankAccountHolderName
            })),
            sepa: sepa => supported(formFields({
                method: 'sepa_debit',
                iban: sepa.iban,
                account_holder: sepa.bankAccountHolderName
            })),
            bacs: notSupported,
            becs: notSupported
        },
        voucher: {
            boleto: boleto => supported(formFields({ method: 'boleto', tax_id: boleto.socialSecurityNumber })),
            oxxo: notSupported,
            efecty: notSupported,
            seven_eleven: notSupported,
            lawson: notSupported
        },
        crypto: notSupported,
        giftCard: notSupported
    },

    flows: {
        Authorize: define('Authorize', {
            method: 'POST',
            path: () => '/transactions',
            body: ({ request, commonData }, context) => Body.form(formFields({
                amount: context.amounts.convert(request.amount, request.currency),
                currency: request.currency,
                capture: request.captureMethod === 'automatic' ? 'true' : 'false',
                merchant_reference: commonData.connectorRequestReferenceId,
                ...context.paymentMethods.dispatchOrThrow(request.paymentMethodData, {
                    connector: context.connector,
                    flow: 'Authorize',
                    amount: request.amount,
                    currency: request.currency,
                    captureMethod: request.captureMethod
                }),
                description: request.description,
                return_url: request.returnUrl,
                notification_url: request.webhookUrl,
                email: request.email ?? commonData.billingAddress?.email,
                billing_country: commonData.billingAddress?.country
            })),
            responseSchema: SettlelineTransactionSchema,
            toOutcome: transactionOutcome
        }),

        Capture: define('Capture', {
            method: 'POST',
            path: ({ request }, context) => transactionPath(request.connectorTransactionId, context, '/settle'),
            body: ({ request }, context) => context.capabilities.captureBody(request, () => Body.form({
                amount: context.amounts.convert(request.amountToCapture, request.currency)
            })),
            responseSchema: SettlelineTransactionSchema,
            toOutcome: transactionOutcome
        }),

        Void: define('Void', {
            method: 'POST',
            path: ({ request }, context) => transactionPath(request.connectorTransactionId, context, '/void'),
            body: () => Body.none(),
            responseSchema: SettlelineVoidSchema,
            toOutcome: (voided, { request }) => ok({
                rawStatus: rawStatus.flag(voided),
                connectorTransactionId: request.connectorTransactionId
            })
        }),

        PSync: define('PSync', {
            method: 'GET',
            path: ({ request }, context) => transactionPath(request.connectorTransactionId, context),
            body: () => Body.none(),
            responseSchema: SettlelineTransactionStateSchema,
            toOutcome: (transaction, { request }, context) => ok({
                rawStatus: rawStatus.text(transaction.state),
                connectorTransactionId: transaction.transaction_id,
                capturedAmount: transaction.settled_amount === undefined
                    ? undefined
                    : context.amounts.convertBack(transaction.settled_amount, request.currency)
            })
        }),

        Refund: define('Refund', {
            method: 'POST',
            path: ({ request }, context) => transactionPath(request.connectorTransactionId, context, '/refunds'),
            body: ({ request }, context) => Body.form(formFields({
                amount: context.amounts.convert(request.refundAmount, request.currency),
                merchant_refund_reference: request.refundId,
                reason: request.reason
            })),
            responseSchema: SettlelineRefundSchema,
            toOutcome: refund => ok({ rawStatus: rawStatus.code(refund.code), connectorRefundId: refund.refund_id })
        })
    },

    webhooks: {
        signature: timestampedHmacScheme({ algorithm: 'sha256', encoding: 'hex', toleranceSeconds: 300 }),
        signatureHeader: 'Settleline-Signature',
        payloadSchema: SettlelineWebhookSchema,
        eventType: payload => payload.event,
        events: {
            'transaction.authorised': 'PaymentAuthorized',
            'transaction.settled': 'PaymentCaptured',
            'transaction.refused': 'PaymentFailed',
            'transaction.voided': 'PaymentCancelled',
            'refund.completed': 'RefundSucceeded',
            'refund.rejected': 'RefundFailed'
        },
        extractReference: payload => payload.refund_id
            ? { type: 'refund', idType: 'connector_refund_id', id: payload.refund_id }
            : { type: 'payment', idType: 'connector_transaction_id', id: payload.transaction_id },
        amounts: ({ currency, amount, settled_amount: settledAmount }) => currency === undefined
            ? undefined
            : {
                authorizedAmount: amount === undefined ? undefined : MajorStringConverter.convertBack(amount, currency),
                capturedAmount: settledAmount === undefined ? undefined : MajorStringConverter.convertBack(settledAmount, currency)
            }
    }
};

export const settlelinePlugin: ConnectorPlugin = {
    id: settlelineConnector.id,
    create: (config, options) => new ConnectorAdapter(settlelineConnector, config, options)
};
