import { describe, it } from 'node:test';
import assert from 'node:assert';
import { novapayPlugin } from '../../libs/connectors/novapay/novapayConnector.js';
import { parseConnectorConfig } from '../../libs/config/connectorConfig.js';
import { ResponseAlreadySetError } from '../../libs/errors/connectorErrors.js';
import type { ErrorResponse } from '../../libs/errors/errorKinds.js';
import { RESPONSE_DESERIALIZATION_FAILED } from '../../libs/flows/connectorAdapter.js';
import { createEnvelope, type ConnectorAuth, type RequestEnvelope } from '../../libs/flows/envelope.js';
import type { AuthorizeData, CaptureData, RefundData } from '../../libs/flows/flowData.js';
import { executeFlow } from '../../libs/flows/flowExecutor.js';
import { CARD_PAYMENT, commonData, failureOf, json, stubTransport, successOf } from '../helpers/fixtures.js';

const adapter = novapayPlugin.create(parseConnectorConfig({
    id: 'novapay',
    baseUrls: { production: 'https://api.novapay.example', sandbox: 'https://sandbox.novapay.example' },
    secondaryBaseUrl: 'https://disputes.novapay.example',
    authScheme: { type: 'bearer' },
    idempotencyHeader: 'Idempotency-Key'
}), { environment: 'sandbox' });

const auth: ConnectorAuth = { type: 'HeaderKey', apiKey: 'test-key' };

const authorize: AuthorizeData = {
    amount: 1050,
    currency: 'USD',
    paymentMethodData: CARD_PAYMENT,
    captureMethod: 'automatic'
};

const capture: CaptureData = {
    amountToCapture: 1000,
    paymentAmount: 1000,
    currency: 'USD',
    connectorTransactionId: 'pay_1'
};

const refund: RefundData = {
    refundId: 'refund_internal_1',
    connectorTransactionId: 'pay_1',
    refundAmount: 500,
    paymentAmount: 1000,
    currency: 'USD'
};

describe('novapay connector', () => {
    it('should implement every flow', () => {
        assert.strictEqual(adapter.supportedFlows().length, 11);
        assert.strictEqual(adapter.amountUnit, 'MinorInteger');
    });

    describe('Authorize', () => {
        it('should send a JSON payment and report an automatic capture as Charged', async () => {
            const { calls, transport } = stubTransport(json(200, { id: 'pay_1', status: 'succeeded', amount: 1050, amount_captured: 1050 }));
            const envelope = createEnvelope('Authorize', commonData(auth, { idempotencyKey: 'idem-1' }), authorize);

            const result = await executeFlow(adapter, envelope, transport);

            assert.strictEqual(calls.length, 1);
            const [request] = calls;
            assert.strictEqual(request.method, 'POST');
            assert.strictEqual(request.url, 'https://sandbox.novapay.example/v1/payments');
            assert.strictEqual(request.headers['Authorization'], 'Bearer test-key');
            assert.strictEqual(request.headers['Idempotency-Key'], 'idem-1');
            assert.strictEqual(request.headers['Content-Type'], 'application/json');
            assert.deepStrictEqual(JSON.parse(request.body ?? ''), {
                amount: 1050,
                currency: 'USD',
                capture: 'automatic',
                reference: 'ref_1',
                payment_method: {
                    type: 'card',
                    card: { number: '4111111111111111', exp_month: '3', exp_year: '2030', cvc: '123' }
                },
                customer: {}
            });

            const response = successOf(result);
            assert.strictEqual(response.status, 'Charged');
            assert.strictEqual(response.connectorTransactionId, 'pay_1');
            assert.strictEqual(response.amountCaptured, 1050);
            assert.strictEqual(result.phase, 'Succeeded');
            assert.strictEqual(result.commonData.status, 'Charged');
        });

        it('should stop at Authorized for a manual capture', async () => {
            const { transport } = stubTransport(json(200, { id: 'pay_1', status: 'requires_capture', amount: 1050 }));
            const envelope = createEnvelope('Authorize', commonData(auth), { ...authorize, captureMethod: 'manual' });

            const response = successOf(await executeFlow(adapter, envelope, transport));

            assert.strictEqual(response.status, 'Authorized');
            assert.strictEqual(response.amountCaptured, undefined);
        });

        it('should return the redirect a customer must follow', async () => {
            const { transport } = stubTransport(json(200, {
                id: 'pay_1',
                status: 'requires_action',
                amount: 1050,
                next_action: { redirect_url: 'https://3ds.novapay.example/challenge' }
            }));
            const envelope = createEnvelope('Authorize', commonData(auth), authorize);

            const response = successOf(await executeFlow(adapter, envelope, transport));

            assert.strictEqual(response.status, 'AuthenticationPending');
            assert.deepStrictEqual(response.redirection, {
                endpoint: 'https://3ds.novapay.example/challenge',
                method: 'GET',
                formFields: {}
            });
        });

        it('should treat a 200 carrying an error object as a decline', async () => {
            const { transport } = stubTransport(json(200, {
                id: 'pay_2',
                status: 'declined',
                amount: 1050,
                error: { code: 'card_declined', message: 'Your card was declined', decline_code: '05' }
            }));
            const envelope = createEnvelope('Authorize', commonData(auth), authorize);

            const result = await executeFlow(adapter, envelope, transport);
            const error = failureOf(result);

            assert.strictEqual(error.statusCode, 200);
            assert.strictEqual(error.code, 'card_declined');
            assert.strictEqual(error.kind, 'CardDeclined');
            assert.strictEqual(error.attemptStatus, 'AuthorizationFailed');
            assert.strictEqual(error.connectorTransactionId, 'pay_2');
            assert.strictEqual(error.networkDeclineCode, '05');
            assert.strictEqual(result.phase, 'Failed');
            assert.strictEqual(result.commonData.status, 'AuthorizationFailed');
        });

        it('should fail an unoffered payment method without calling the gateway', async () => {
            const { calls, transport } = stubTransport(json(200, {}));
            const envelope = createEnvelope('Authorize', commonData(auth), {
                ...authorize,
                paymentMethodData: { type: 'crypto', crypto: { payCurrency: 'BTC' } }
            });

            const result = await executeFlow(adapter, envelope, transport);

            assert.strictEqual(calls.length, 0);
            assert.deepStrictEqual(failureOf(result), {
                statusCode: 501,
                code: 'NOT_SUPPORTED',
                message: 'Payment method crypto is not supported by novapay',
                kind: 'NotSupported'
            });
            assert.strictEqual(result.commonData.status, 'Pending');
        });
    });

    describe('Capture', () => {
        it('should send the amount for a full capture', async () => {
            const { calls, transport } = stubTransport(json(200, { id: 'pay_1', status: 'captured', amount: 1000, amount_captured: 1000 }));
            const envelope = createEnvelope('Capture', commonData(auth, { status: 'Authorized' }), capture);

            const result = await executeFlow(adapter, envelope, transport);

            assert.strictEqual(calls[0]?.url, 'https://sandbox.novapay.example/v1/payments/pay_1/capture');
            assert.strictEqual(calls[0]?.body, '{"amount":1000}');
            assert.strictEqual(successOf(result).status, 'Charged');
        });

        it('should report a partial settlement as PartialCharged', async () => {
            const { transport } = stubTransport(json(200, { id: 'pay_1', status: 'captured', amount: 1000, amount_captured: 400 }));
            const envelope = createEnvelope('Capture', commonData(auth, { status: 'Authorized' }), { ...capture, amountToCapture: 400 });

            const result = await executeFlow(adapter, envelope, transport);
            const response = successOf(result);

            assert.strictEqual(response.status, 'PartialCharged');
            assert.strictEqual(response.amountCaptured, 400);
            assert.strictEqual(result.commonData.status, 'PartialCharged');
        });

        it('should resolve an already-captured error to the terminal status it names', async () => {
            const { transport } = stubTransport(json(409, { error: { code: 'payment_already_captured', message: 'Payment already captured' } }));
            const envelope = createEnvelope('Capture', commonData(auth, { status: 'Authorized' }), capture);

            const result = await executeFlow(adapter, envelope, transport);

            assert.strictEqual(result.phase, 'Succeeded');
            assert.deepStrictEqual(successOf(result), {
                status: 'Charged',
                connectorTransactionId: 'pay_1',
                amountCaptured: 1000,
                idempotentReplay: true
            });
            assert.strictEqual(result.commonData.status, 'Charged');
        });

        it('should classify an unreadable error body by HTTP status', async () => {
            const { transport } = stubTransport({ statusCode: 502, body: 'Bad Gateway' });
            const envelope = createEnvelope('Capture', commonData(auth, { status: 'Authorized' }), capture);

            const result = await executeFlow(adapter, envelope, transport);
            const error = failureOf(result);

            assert.strictEqual(error.code, 'No error code');
            assert.strictEqual(error.kind, 'Transient');
            assert.strictEqual(error.attemptStatus, undefined);
            assert.strictEqual(result.commonData.status, 'Authorized');
        });

        it('should propagate a transport failure without recording a response', async () => {
            const envelope = createEnvelope('Capture', commonData(auth, { status: 'Authorized' }), capture);

            await assert.rejects(
                executeFlow(adapter, envelope, async () => {
                    throw new Error('connection reset');
                }),
                /connection reset/
            );
            assert.strictEqual(envelope.response, undefined);
        });
    });

    describe('PSync', () => {
        it('should look a payment up by reference when it has no gateway id', async () => {
            const { calls, transport } = stubTransport(json(200, { id: 'pay_1', status: 'created', amount: 1050 }));
            const envelope = createEnvelope('PSync', commonData(auth), { amount: 1050, currency: 'USD' });

            const result = await executeFlow(adapter, envelope, transport);

            assert.strictEqual(calls[0]?.method, 'GET');
            assert.strictEqual(calls[0]?.url, 'https://sandbox.novapay.example/v1/payments/reference/ref_1');
            assert.strictEqual(calls[0]?.body, undefined);
            assert.strictEqual(calls[0]?.headers['Content-Type'], undefined);
            assert.strictEqual(successOf(result).status, 'Pending');
        });

        it('should report a body that does not parse as a deserialization failure', async () => {
            for (const body of ['<html>oops</html>', '{"id":"pay_1"}']) {
                const { transport } = stubTransport({ statusCode: 200, body });
                const envelope: RequestEnvelope<'PSync'> = createEnvelope('PSync', commonData(auth, { status: 'Authorized' }), {
                    connectorTransactionId: 'pay_1',
                    amount: 1050,
                    currency: 'USD'
                });

                const result: RequestEnvelope<'PSync'> = await executeFlow(adapter, envelope, transport);
                const error: ErrorResponse = failureOf(result);

                assert.strictEqual(error.statusCode, 200);
                assert.strictEqual(error.code, RESPONSE_DESERIALIZATION_FAILED);
                assert.strictEqual(error.kind, 'Unknown');
                assert.strictEqual(result.commonData.status, 'Authorized');
            }
        });
    });

    describe('Refund', () => {
        it('should map the refund status without touching the attempt status', async () => {
            const { calls, transport } = stubTransport(json(200, { id: 're_1', status: 'pending', amount: 500, payment_id: 'pay_1' }));
            const envelope = createEnvelope('Refund', commonData(auth, { status: 'Charged' }), refund);

            const result = await executeFlow(adapter, envelope, transport);

            assert.deepStrictEqual(JSON.parse(calls[0]?.body ?? ''), { payment_id: 'pay_1', amount: 500, reference: 'refund_internal_1' });
            assert.deepStrictEqual(successOf(result), { refundStatus: 'Pending', connectorRefundId: 're_1', idempotentReplay: false });
            assert.strictEqual(result.commonData.status, 'Charged');
        });

        it('should resolve an already-refunded error to a successful refund', async () => {
            const { transport } = stubTransport(json(409, {
                error: { code: 'refund_already_succeeded', payment_id: 'pay_1', refund_id: 're_9' }
            }));
            const envelope = createEnvelope('Refund', commonData(auth, { status: 'Charged' }), refund);

            const result = await executeFlow(adapter, envelope, transport);

            assert.deepStrictEqual(successOf(result), { refundStatus: 'Success', connectorRefundId: 're_9', idempotentReplay: true });
        });

        it('should keep the error when an already-refunded reply names only the payment', async () => {
            const { transport } = stubTransport(json(409, { error: { code: 'refund_already_succeeded', payment_id: 'pay_1' } }));
            const envelope = createEnvelope('Refund', commonData(auth, { status: 'Charged' }), refund);

            const result = await executeFlow(adapter, envelope, transport);
            const error = failureOf(result);

            assert.strictEqual(error.kind, 'AlreadyProcessed');
            assert.strictEqual(error.refundStatus, 'Success');
            assert.strictEqual(error.connectorTransactionId, 'pay_1');
            assert.strictEqual(error.connectorRefundId, undefined);
        });
    });

    describe('RSync', () => {
        it('should report the requested refund id on an already-refunded reply', async () => {
            const { transport } = stubTransport(json(409, { error: { code: 'refund_already_succeeded', payment_id: 'pay_1' } }));
            const envelope = createEnvelope('RSync', commonData(auth, { status: 'Charged' }), {
                refundId: 'refund_internal_1',
                connectorTransactionId: 'pay_1',
                connectorRefundId: 're_9',
                refundAmount: 500,
                currency: 'USD'
            });

            const result = await executeFlow(adapter, envelope, transport);

            assert.deepStrictEqual(successOf(result), { refundStatus: 'Success', connectorRefundId: 're_9', idempotentReplay: true });
        });
    });

    it('should send dispute actions to the dispute host', async () => {
        const { calls, transport } = stubTransport(json(200, { id: 'dp_1', status: 'accepted' }));
        const envelope = createEnvelope('AcceptDispute', commonData(auth), { connectorDisputeId: 'dp_1' });

        const result = await executeFlow(adapter, envelope, transport);

        assert.strictEqual(calls[0]?.url, 'https://disputes.novapay.example/v1/disputes/dp_1/accept');
        assert.deepStrictEqual(successOf(result), { disputeStatus: 'Accepted', connectorDisputeId: 'dp_1', connectorStatus: 'accepted' });
    });

    it('should refuse to handle a response twice', async () => {
        const { transport } = stubTransport(json(200, { id: 'pay_1', status: 'captured', amount: 1000 }));
        const envelope = createEnvelope('Capture', commonData(auth, { status: 'Authorized' }), capture);

        const result = await executeFlow(adapter, envelope, transport);

        assert.throws(() => adapter.handleResponse(result, json(200, { id: 'pay_1', status: 'captured', amount: 1000 })), ResponseAlreadySetError);
    });

    it('should classify the same error reply identically every time', () => {
        const envelope = createEnvelope('Capture', commonData(auth), capture);
        const reply = json(402, { error: { code: 'insufficient_funds', message: 'Insufficient funds' } });

        const first = adapter.handleError(envelope, reply);
        assert.deepStrictEqual(adapter.handleError(envelope, reply), first);
        assert.strictEqual(first.kind, 'InsufficientFunds');
    });
});
