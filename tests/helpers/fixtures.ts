import assert from 'node:assert';
import type { ErrorResponse } from '../../libs/errors/errorKinds.js';
import type { CommonData, ConnectorAuth, RequestEnvelope } from '../../libs/flows/envelope.js';
import type { FlowResponse } from '../../libs/flows/flowData.js';
import type { Transport } from '../../libs/flows/flowExecutor.js';
import type { RequestFlow } from '../../libs/flows/flowKinds.js';
import type { ConnectorRequest, RawResponse } from '../../libs/flows/http.js';
import type { CardDetails, PaymentMethodData } from '../../libs/paymentMethods/paymentMethodData.js';

export const TEST_CARD: CardDetails = {
    cardNumber: '4111111111111111',
    expiryMonth: '3',
    expiryYear: '2030',
    cvc: '123'
};

export const CARD_PAYMENT: PaymentMethodData = { type: 'card', card: TEST_CARD };

export function commonData(auth: ConnectorAuth, overrides: Partial<CommonData> = {}): CommonData {
    return {
        merchantId: 'merchant_test',
        paymentId: 'pay_internal_1',
        attemptId: 'attempt_1',
        status: 'Pending',
        connectorAuth: auth,
        connectorRequestReferenceId: 'ref_1',
        requestTimestamp: '1700000000',
        ...overrides
    };
}

export interface StubTransport {
    readonly calls: ConnectorRequest[];
    readonly transport: Transport;
}

/** Transport that answers every request with the same reply and records what it was sent. */
export function stubTransport(reply: RawResponse): StubTransport {
    const calls: ConnectorRequest[] = [];
    return {
        calls,
        transport: async request => {
            calls.push(request);
            return reply;
        }
    };
}

export function json(statusCode: number, body: unknown): RawResponse {
    return { statusCode, body: JSON.stringify(body) };
}

export function successOf<F extends RequestFlow>(envelope: RequestEnvelope<F>): FlowResponse<F> {
    const { response } = envelope;
    assert.ok(response, 'response should be populated');
    assert.ok(response.ok, 'response should be a success');
    return response.value;
}

export function failureOf<F extends RequestFlow>(envelope: RequestEnvelope<F>): ErrorResponse {
    const { response } = envelope;
    assert.ok(response, 'response should be populated');
    assert.ok(!response.ok, 'response should be a failure');
    return response.error;
}
