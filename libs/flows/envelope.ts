/**
 * RequestEnvelope: the one value a flow invocation reads and produces.
 *
 * An envelope is immutable. Populating the response returns a new envelope;
 * the response can be populated once only, and the attempt status on the
 * common data only moves forward through the finality lattice.
 */

import { ResponseAlreadySetError } from '../errors/connectorErrors.js';
import type { ErrorResponse } from '../errors/errorKinds.js';
import type { MinorUnit } from '../amount/amountConverter.js';
import { advanceAttemptStatus, type AttemptStatus } from '../status/statuses.js';
import type { FlowRequest, FlowResponse } from './flowData.js';
import type { RequestFlow } from './flowKinds.js';
import type { Result } from './result.js';

/**
 * Credentials for one merchant account at one gateway. Which fields a
 * gateway reads depends on its auth scheme.
 */
export type ConnectorAuth =
    | { readonly type: 'HeaderKey'; readonly apiKey: string }
    | { readonly type: 'BodyKey'; readonly apiKey: string; readonly key1: string }
    | { readonly type: 'SignatureKey'; readonly apiKey: string; readonly key1: string; readonly apiSecret: string }
    | { readonly type: 'MultiAuthKey'; readonly apiKey: string; readonly key1: string; readonly apiSecret: string; readonly key2: string }
    | { readonly type: 'NoKey' };

export interface PaymentAddress {
    readonly line1?: string;
    readonly line2?: string;
    readonly city?: string;
    readonly state?: string;
    readonly zip?: string;
    /** ISO 3166-1 alpha-2 */
    readonly country?: string;
    readonly firstName?: string;
    readonly lastName?: string;
    readonly phone?: string;
    readonly email?: string;
}

export interface CustomerInfo {
    readonly customerId?: string;
    readonly connectorCustomerId?: string;
    readonly name?: string;
    readonly email?: string;
    readonly phone?: string;
}

export interface CommonData {
    readonly merchantId: string;
    readonly paymentId: string;
    readonly attemptId: string;
    /** Attempt status as last recorded */
    readonly status: AttemptStatus;
    readonly connectorAuth: ConnectorAuth;
    /** Id the gateway sees for this attempt; used as its idempotency key where it has one */
    readonly connectorRequestReferenceId: string;
    /** Fixed per invocation; every timestamp a signature covers comes from here */
    readonly requestTimestamp: string;
    readonly idempotencyKey?: string;
    readonly billingAddress?: PaymentAddress;
    readonly shippingAddress?: PaymentAddress;
    readonly customer?: CustomerInfo;
    readonly testMode?: boolean;
    /** Amount already captured on the attempt, used when a gateway reports settlement without an amount */
    readonly amountCaptured?: MinorUnit;
    readonly connectorMetadata?: Readonly<Record<string, string>>;
}

export type EnvelopePhase = 'Building' | 'Dispatched' | 'Succeeded' | 'Failed';

export interface RequestEnvelope<F extends RequestFlow, Req = FlowRequest<F>, Resp = FlowResponse<F>> {
    readonly flow: F;
    readonly phase: EnvelopePhase;
    readonly commonData: CommonData;
    readonly request: Req;
    readonly response?: Result<Resp, ErrorResponse>;
}

export function createEnvelope<F extends RequestFlow>(
    flow: F,
    commonData: CommonData,
    request: FlowRequest<F>
): RequestEnvelope<F> {
    const envelope: RequestEnvelope<F> = {
        flow,
        phase: 'Building',
        commonData: Object.freeze({ ...commonData }),
        request
    };
    return Object.freeze(envelope);
}

/**
 * Phase change for an envelope whose request has been handed to the transport.
 */
export function markDispatched<F extends RequestFlow>(envelope: RequestEnvelope<F>): RequestEnvelope<F> {
    if (envelope.response) {
        throw new ResponseAlreadySetError(envelope.flow);
    }
    if (envelope.phase === 'Dispatched') {
        return envelope;
    }
    const dispatched: RequestEnvelope<F> = { ...envelope, phase: 'Dispatched' };
    return Object.freeze(dispatched);
}

/**
 * Returns a copy of the envelope with its response populated.
 *
 * `proposedStatus` is applied to the attempt status only when it moves
 * forward; a regression keeps the recorded status.
 */
export function withResponse<F extends RequestFlow>(
    envelope: RequestEnvelope<F>,
    response: Result<FlowResponse<F>, ErrorResponse>,
    proposedStatus?: AttemptStatus
): RequestEnvelope<F> {
    if (envelope.response) {
        throw new ResponseAlreadySetError(envelope.flow);
    }

    const status = proposedStatus === undefined
        ? envelope.commonData.status
        : advanceAttemptStatus(envelope.commonData.status, proposedStatus).status;

    const populated: RequestEnvelope<F> = {
        ...envelope,
        phase: response.ok ? 'Succeeded' : 'Failed',
        commonData: status === envelope.commonData.status
            ? envelope.commonData
            : Object.freeze({ ...envelope.commonData, status }),
        response: Object.freeze(response)
    };
    return Object.freeze(populated);
}
