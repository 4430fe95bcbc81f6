/**
 * Per-flow transformer contract.
 *
 * A connector implements a flow by describing the request (method, path,
 * body, extra headers) and how to read the gateway's reply into a flow
 * outcome. The gateway's response type is private to the definition: the
 * schema validates it, `toOutcome` reads it, and nothing outside ever sees it.
 */

import type { MinorUnit } from '../amount/amountConverter.js';
import type { RawError } from '../errors/errorTaxonomyMapper.js';
import type { RawStatus } from '../status/statusReconciler.js';
import { safeValidate, type SchemaOf } from '../validation/zod-middleware.js';
import type { RequestEnvelope } from './envelope.js';
import type { HttpMethod, MandateReference, RedirectForm } from './flowData.js';
import type { RequestFlow } from './flowKinds.js';
import type { RequestBody } from './http.js';
import { err, ok, type Result } from './result.js';

export interface PaymentOutcome {
    readonly rawStatus: RawStatus;
    readonly connectorTransactionId?: string;
    readonly connectorResponseReferenceId?: string;
    /** Amount the gateway reports as captured, in minor units */
    readonly capturedAmount?: MinorUnit;
    readonly redirection?: RedirectForm;
    readonly mandateReference?: MandateReference;
    readonly networkTransactionId?: string;
}

export interface RefundOutcome {
    readonly rawStatus: RawStatus;
    readonly connectorRefundId: string;
}

export interface OrderOutcome {
    readonly orderId: string;
    readonly rawStatus?: RawStatus;
}

export interface DisputeOutcome {
    readonly rawStatus: RawStatus;
    readonly connectorDisputeId: string;
}

export interface FlowOutcomeMap {
    Authorize: PaymentOutcome;
    Capture: PaymentOutcome;
    Void: PaymentOutcome;
    PSync: PaymentOutcome;
    SetupMandate: PaymentOutcome;
    Refund: RefundOutcome;
    RSync: RefundOutcome;
    CreateOrder: OrderOutcome;
    DefendDispute: DisputeOutcome;
    AcceptDispute: DisputeOutcome;
    SubmitEvidence: DisputeOutcome;
}

export type FlowOutcome<F extends RequestFlow> = FlowOutcomeMap[F];

/**
 * A 2xx body the gateway uses to say "no" (some gateways never use error
 * status codes) is reported as a rejection carrying the extracted error.
 */
export type OutcomeResult<F extends RequestFlow> = Result<FlowOutcome<F>, RawError>;

export interface FlowDefinition<F extends RequestFlow, R, C> {
    readonly method: HttpMethod;
    path(envelope: RequestEnvelope<F>, context: C): string;
    body(envelope: RequestEnvelope<F>, context: C): RequestBody;
    headers?(envelope: RequestEnvelope<F>, context: C): Readonly<Record<string, string>>;
    readonly responseSchema: SchemaOf<R>;
    /** Decoder for non-JSON bodies; JSON.parse when omitted */
    decode?(body: string): unknown;
    /** Value used when the gateway replies with an empty body */
    readonly emptyResponse?: R;
    toOutcome(response: R, envelope: RequestEnvelope<F>, context: C): OutcomeResult<F>;
}

export type ParseFailure =
    | { readonly type: 'deserialization'; readonly detail: string }
    | { readonly type: 'rejected'; readonly error: RawError };

export interface FlowHandler<F extends RequestFlow, C> {
    readonly flow: F;
    readonly method: HttpMethod;
    path(envelope: RequestEnvelope<F>, context: C): string;
    body(envelope: RequestEnvelope<F>, context: C): RequestBody;
    headers(envelope: RequestEnvelope<F>, context: C): Readonly<Record<string, string>>;
    parse(body: string, envelope: RequestEnvelope<F>, context: C): Result<FlowOutcome<F>, ParseFailure>;
}

/** Handlers of one connector, keyed by flow. A missing key means NotSupported. */
export type FlowTable<C> = { readonly [F in RequestFlow]?: FlowHandler<F, C> };

export function defineFlow<F extends RequestFlow, R, C>(flow: F, definition: FlowDefinition<F, R, C>): FlowHandler<F, C> {
    const decode = (body: string): Result<unknown, string> => {
        try {
            return ok(definition.decode ? definition.decode(body) : JSON.parse(body));
        } catch (error) {
            return err(error instanceof Error ? error.message : String(error));
        }
    };

    return {
        flow,
        method: definition.method,
        path: (envelope, context) => definition.path(envelope, context),
        body: (envelope, context) => definition.body(envelope, context),
        headers: (envelope, context) => definition.headers?.(envelope, context) ?? {},
        parse: (body, envelope, context) => {
            let response: R;
            if (body.trim() === '' && definition.emptyResponse !== undefined) {
                response = definition.emptyResponse;
            } else {
                const decoded = decode(body);
                if (!decoded.ok) {
                    return err({ type: 'deserialization', detail: decoded.error });
                }
                const validated = safeValidate(definition.responseSchema, decoded.value, `${flow}:response`);
                if (!validated.ok) {
                    return err({ type: 'deserialization', detail: validated.error.message });
                }
                response = validated.value;
            }

            const outcome = definition.toOutcome(response, envelope, context);
            return outcome.ok ? outcome : err({ type: 'rejected', error: outcome.error });
        }
    };
}

/**
 * Binds the connector context type once, so each flow only names its marker:
 * `const define = flowsFor<MyContext>(); define('Capture', { ... })`.
 */
export function flowsFor<C>() {
    return <F extends RequestFlow, R>(flow: F, definition: FlowDefinition<F, R, C>): FlowHandler<F, C> =>
        defineFlow(flow, definition);
}
