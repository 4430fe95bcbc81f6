/**
 * novapay: JSON API with bearer-key auth and amounts in minor units.
 *
 * Cards and a handful of wallets only. A declined payment comes back as 200
 * with an `error` object next to the payment, so the payment transformer
 * reports it as a rejection rather than a status.
 */

import type { Currency } from '../../amount/currency.js';
import { requireField } from '../../errors/connectorErrors.js';
import type { RawError } from '../../errors/errorTaxonomyMapper.js';
import { jsonErrorParser } from '../../flows/commonCapabilities.js';
import { ConnectorAdapter, type ConnectorContext, type ConnectorDefinition } from '../../flows/connectorAdapter.js';
import { flowsFor, type DisputeOutcome, type PaymentOutcome } from '../../flows/flowDefinition.js';
import { Body, joinUrl } from '../../flows/http.js';
import { err, ok, type Result } from '../../flows/result.js';
import { missingField, notSupported, supported } from '../../paymentMethods/dispatcher.js';
import { failureStatusFor, rawStatus, successStatusFor } from '../../status/statusReconciler.js';
import { plainHmacScheme } from '../../webhooks/signature.js';
import type { ConnectorPlugin } from '../registry.js';
import {
    NovapayDisputeSchema,
    NovapayErrorBodySchema,
    NovapayOrderSchema,
    NovapayPaymentSchema,
    NovapayRefundSchema,
    NovapayWebhookSchema,
    type NovapayDispute,
    type NovapayError,
    type NovapayPayment,
    type NovapayPaymentMethod,
    type NovapayWebhook
} from './novapaySchemas.js';

type NovapayContext = ConnectorContext<'MinorInteger', NovapayPaymentMethod>;

const define = flowsFor<NovapayContext>();

function toRawError(error: NovapayError): RawError {
    return {
        code: error.code,
        message: error.message,
        connectorTransactionId: error.payment_id,
        connectorRefundId: error.refund_id,
        networkDeclineCode: error.decline_code,
        networkAdviceCode: error.advice_code,
        networkErrorMessage: error.network_message
    };
}

function paymentOutcome(payment: NovapayPayment, currency: Currency | undefined, context: NovapayContext): Result<PaymentOutcome, RawError> {
    if (payment.error) {
        return err({ ...toRawError(payment.error), connectorTransactionId: payment.error.payment_id ?? payment.id });
    }

    const { next_action: nextAction } = payment;
    return ok({
        rawStatus: rawStatus.text(payment.status),
        connectorTransactionId: payment.id,
        connectorResponseReferenceId: payment.reference,
        capturedAmount: payment.amount_captured !== undefined && currency !== undefined
            ? context.amounts.convertBack(payment.amount_captured, currency)
            : undefined,
        redirection: nextAction
            ? { endpoint: nextAction.redirect_url, method: nextAction.method, formFields: nextAction.params }
            : undefined,
        mandateReference: payment.mandate_id ? { connectorMandateId: payment.mandate_id } : undefined,
        networkTransactionId: payment.network_transaction_id
    });
}

function disputeUrl(context: NovapayContext, connectorDisputeId: string, action: string): string {
    const id = encodeURIComponent(requireField(connectorDisputeId, 'connectorDisputeId', context.connector));
    return joinUrl(context.config.secondaryBaseUrl ?? context.baseUrl, `/v1/disputes/${id}/${action}`);
}

function disputeOutcome(dispute: NovapayDispute): Result<DisputeOutcome, RawError> {
    return ok({ rawStatus: rawStatus.text(dispute.status), connectorDisputeId: dispute.id });
}

export const novapayConnector: ConnectorDefinition<'MinorInteger', NovapayPaymentMethod, NovapayWebhook> = {
    id: 'novapay',
    displayName: 'NovaPay',
    amountUnit: 'MinorInteger',

    statusVocabulary: {
        payment: {
            text: {
                created: 'Pending',
                requires_action: 'AuthenticationPending',
                requires_capture: 'Authorized',
                capture_pending: 'CaptureInitiated',
                cancel_pending: 'VoidInitiated',
                succeeded: successStatusFor,
                captured: 'Charged',
                partially_captured: 'PartialCharged',
                canceled: 'Voided',
                declined: failureStatusFor
            }
        },
        refund: {
            text: {
                pending: 'Pending',
                requires_review: 'ManualReview',
                succeeded: 'Success',
                failed: 'Failure'
            }
        },
        dispute: {
            text: {
                needs_response: 'Opened',
                under_review: 'Challenged',
                accepted: 'Accepted',
                won: 'Won',
                lost: 'Lost',
                expired: 'Expired',
                canceled: 'Cancelled'
            }
        }
    },

    errorCodes: {
        card_declined: 'CardDeclined',
        insufficient_funds: 'InsufficientFunds',
        api_key_invalid: 'AuthenticationFailed',
        rate_limited: 'RateLimited',
        processing_error: 'Transient',
        amount_too_large: 'Validation',
        payment_already_captured: { kind: 'AlreadyProcessed', attemptStatus: 'Charged' },
        payment_already_canceled: { kind: 'AlreadyProcessed', attemptStatus: 'Voided' },
        refund_already_succeeded: { kind: 'AlreadyProcessed', refundStatus: 'Success' }
    },

    parseError: jsonErrorParser('novapay', NovapayErrorBodySchema, body => toRawError(body.error)),

    paymentMethods: {
        card: card => supported({
            type: 'card',
            card: {
                number: card.cardNumber,
                exp_month: card.expiryMonth,
                exp_year: card.expiryYear,
                cvc: card.cvc,
                holder_name: card.holderName
            }
        }),
        cardRedirect: notSupported,
        wallet: {
            apple_pay: wallet => supported({
                type: 'apple_pay',
                apple_pay: {
                    payment_data: wallet.paymentData,
                    network: wallet.paymentMethod.network,
                    transaction_id: wallet.transactionIdentifier
                }
            }),
            google_pay: wallet => supported({
                type: 'google_pay',
                google_pay: { token: wallet.tokenizationData.token, network: wallet.info.cardNetwork }
            }),
            paypal_redirect: wallet => supported({ type: 'paypal', paypal: { email: wallet.email } }),
            paypal_sdk: notSupported,
            samsung_pay: notSupported,
            ali_pay_redirect: notSupported,
            we_chat_pay_redirect: notSupported,
            amazon_pay_redirect: notSupported,
            mb_way: (wallet, context) => wallet.phoneNumber.trim() === ''
                ? missingField('wallet.mb_way.phoneNumber', context)
                : supported({ type: 'mb_way', mb_way: { phone: wallet.phoneNumber } })
        },
        payLater: notSupported,
        bankRedirect: notSupported,
        bankTransfer: notSupported,
        bankDebit: notSupported,
        voucher: notSupported,
        crypto: notSupported,
        giftCard: notSupported
    },

    flows: {
        Authorize: define('Authorize', {
            method: 'POST',
            path: () => '/v1/payments',
            body: ({ request, commonData }, context) => Body.json({
                amount: context.amounts.convert(request.amount, request.currency),
                currency: request.currency,
                capture: request.captureMethod,
                reference: commonData.connectorRequestReferenceId,
                payment_method: context.paymentMethods.dispatchOrThrow(request.paymentMethodData, {
                    connector: context.connector,
                    flow: 'Authorize',
                    amount: request.amount,
                    currency: request.currency,
                    captureMethod: request.captureMethod
                }),
                order_id: request.connectorOrderId,
                description: request.description,
                return_url: request.returnUrl,
                customer: { email: request.email ?? commonData.customer?.email },
                metadata: request.metadata
            }),
            responseSchema: NovapayPaymentSchema,
            toOutcome: (payment, { request }, context) => paymentOutcome(payment, request.currency, context)
        }),

        Capture: define('Capture', {
            method: 'POST',
            path: ({ request }, context) =>
                `/v1/payments/${encodeURIComponent(requireField(request.connectorTransactionId, 'connectorTransactionId', context.connector))}/capture`,
            body: ({ request }, context) => context.capabilities.captureBody(request, () => Body.json({
                amount: context.amounts.convert(request.amountToCapture, request.currency)
            })),
            responseSchema: NovapayPaymentSchema,
            toOutcome: (payment, { request }, context) => paymentOutcome(payment, request.currency, context)
        }),

        Void: define('Void', {
            method: 'POST',
            path: ({ request }, context) =>
                `/v1/payments/${encodeURIComponent(requireField(request.connectorTransactionId, 'connectorTransactionId', context.connector))}/cancel`,
            body: ({ request }) => request.cancellationReason
                ? Body.json({ reason: request.cancellationReason })
                : Body.none(),
            responseSchema: NovapayPaymentSchema,
            toOutcome: (payment, { request }, context) => paymentOutcome(payment, request.currency, context)
        }),

        PSync: define('PSync', {
            method: 'GET',
            path: ({ request, commonData }) => request.connectorTransactionId
                ? `/v1/payments/${encodeURIComponent(request.connectorTransactionId)}`
                : `/v1/payments/reference/${encodeURIComponent(commonData.connectorRequestReferenceId)}`,
            body: () => Body.none(),
            responseSchema: NovapayPaymentSchema,
            toOutcome: (payment, { request }, context) => paymentOutcome(payment, request.currency, context)
        }),

        SetupMandate: define('SetupMandate', {
            method: 'POST',
            path: () => '/v1/mandates',
            body: ({ request, commonData }, context) => Body.json({
                amount: context.amounts.convert(request.amount, request.currency),
                currency: request.currency,
                reference: commonData.connectorRequestReferenceId,
                payment_method: context.paymentMethods.dispatchOrThrow(request.paymentMethodData, {
                    connector: context.connector,
                    flow: 'SetupMandate',
                    amount: request.amount,
                    currency: request.currency
                }),
                customer_acceptance: request.customerAcceptance && {
                    accepted_at: request.customerAcceptance.acceptedAt,
                    ip_address: request.customerAcceptance.onlineIpAddress,
                    user_agent: request.customerAcceptance.onlineUserAgent
                },
                return_url: request.returnUrl
            }),
            responseSchema: NovapayPaymentSchema,
            toOutcome: (payment, { request }, context) => paymentOutcome(payment, request.currency, context)
        }),

        Refund: define('Refund', {
            method: 'POST',
            path: () => '/v1/refunds',
            body: ({ request }, context) => Body.json({
                payment_id: requireField(request.connectorTransactionId, 'connectorTransactionId', context.connector),
                amount: context.amounts.convert(request.refundAmount, request.currency),
                reason: request.reason,
                reference: request.refundId
            }),
            responseSchema: NovapayRefundSchema,
            toOutcome: refund => ok({ rawStatus: rawStatus.text(refund.status), connectorRefundId: refund.id })
        }),

        RSync: define('RSync', {
            method: 'GET',
            path: ({ request }, context) =>
                `/v1/refunds/${encodeURIComponent(requireField(request.connectorRefundId, 'connectorRefundId', context.connector))}`,
            body: () => Body.none(),
            responseSchema: NovapayRefundSchema,
            toOutcome: refund => ok({ rawStatus: rawStatus.text(refund.status), connectorRefundId: refund.id })
        }),

        CreateOrder: define('CreateOrder', {
            method: 'POST',
            path: () => '/v1/orders',
            body: ({ request }, context) => Body.json({
                amount: context.amounts.convert(request.amount, request.currency),
                currency: request.currency,
                receipt: request.receipt,
                metadata: request.metadata
            }),
            responseSchema: NovapayOrderSchema,
            toOutcome: order => ok({ orderId: order.id, rawStatus: rawStatus.text(order.status) })
        }),

        DefendDispute: define('DefendDispute', {
            method: 'POST',
            path: ({ request }, context) => disputeUrl(context, request.connectorDisputeId, 'defend'),
            body: ({ request }) => Body.json({ reason_code: request.defenseReasonCode }),
            responseSchema: NovapayDisputeSchema,
            toOutcome: disputeOutcome
        }),

        AcceptDispute: define('AcceptDispute', {
            method: 'POST',
            path: ({ request }, context) => disputeUrl(context, request.connectorDisputeId, 'accept'),
            body: () => Body.none(),
            responseSchema: NovapayDisputeSchema,
            toOutcome: disputeOutcome
        }),

        SubmitEvidence: define('SubmitEvidence', {
            method: 'POST',
            path: ({ request }, context) => disputeUrl(context, request.connectorDisputeId, 'evidence'),
            body: ({ request: { evidence } }) => Body.json({
                uncategorized_text: evidence.uncategorizedText,
                receipt_file: evidence.receiptFileId,
                shipping_tracking_number: evidence.shippingTrackingNumber,
                customer_communication_file: evidence.customerCommunicationFileId,
                refund_policy_disclosure: evidence.refundPolicyDisclosure
            }),
            responseSchema: NovapayDisputeSchema,
            toOutcome: disputeOutcome
        })
    },

    webhooks: {
        signature: plainHmacScheme('sha512', 'base64'),
        signatureHeader: 'X-Novapay-Signature',
        payloadSchema: NovapayWebhookSchema,
        eventType: payload => payload.type,
        events: {
            'payment.authorized': 'PaymentAuthorized',
            'payment.captured': 'PaymentCaptured',
            'payment.failed': 'PaymentFailed',
            'payment.canceled': 'PaymentCancelled',
            'refund.succeeded': 'RefundSucceeded',
            'refund.failed': 'RefundFailed',
            'dispute.created': 'DisputeOpened',
            'dispute.won': 'DisputeWon',
            'dispute.lost': 'DisputeLost'
        },
        extractReference: ({ data }) => {
            switch (data.object) {
                case 'payment':
                    return { type: 'payment', idType: 'connector_transaction_id', id: data.id };
                case 'refund':
                    return { type: 'refund', idType: 'connector_refund_id', id: data.id };
                case 'dispute':
                    return { type: 'dispute', idType: 'connector_dispute_id', id: data.id };
            }
        },
        rawStatus: ({ data }) => rawStatus.text(data.status),
        amounts: ({ data }) => data.object === 'payment'
            ? { authorizedAmount: data.amount, capturedAmount: data.amount_captured }
            : undefined
    }
};

export const novapayPlugin: ConnectorPlugin = {
    id: novapayConnector.id,
    create: (config, options) => new ConnectorAdapter(novapayConnector, config, options)
};
