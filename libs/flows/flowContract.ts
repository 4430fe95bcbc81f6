import type { UnitKind } from '../amount/amountConverter.js';
import type { ErrorResponse } from '../errors/errorKinds.js';
import type { WebhookProcessor } from '../webhooks/webhookEventMapper.js';
import type { RequestEnvelope } from './envelope.js';
import type { RequestFlow } from './flowKinds.js';
import type { ConnectorRequest, RawResponse, RequestBody } from './http.js';

/**
 * What the routing service sees of a connector. Every operation takes the
 * envelope and nothing else; no adapter keeps per-request state.
 *
 * Request builders throw NotSupportedError for a flow the connector does not
 * implement and MissingRequiredFieldError for absent input. Response
 * handlers never throw for gateway content: every reply becomes a populated
 * success or ErrorResponse.
 */
export interface FlowContract {
    readonly id: string;
    readonly displayName: string;
    readonly amountUnit: UnitKind;
    readonly webhooks?: WebhookProcessor;

    supports(flow: RequestFlow): boolean;
    supportedFlows(): readonly RequestFlow[];

    headers<F extends RequestFlow>(envelope: RequestEnvelope<F>): Readonly<Record<string, string>>;
    url<F extends RequestFlow>(envelope: RequestEnvelope<F>): string;
    body<F extends RequestFlow>(envelope: RequestEnvelope<F>): RequestBody;
    buildRequest<F extends RequestFlow>(envelope: RequestEnvelope<F>): ConnectorRequest;

    /** Populates the envelope's response from a gateway reply of any status code. */
    handleResponse<F extends RequestFlow>(envelope: RequestEnvelope<F>, raw: RawResponse): RequestEnvelope<F>;
    /** Classifies a non-2xx reply. Pure: the same reply gives an equal ErrorResponse. */
    handleError<F extends RequestFlow>(envelope: RequestEnvelope<F>, raw: RawResponse): ErrorResponse;
    /**
     * Populates the envelope with an error. An AlreadyProcessed error that
     * names a terminal status becomes a success at that status.
     */
    applyError<F extends RequestFlow>(envelope: RequestEnvelope<F>, error: ErrorResponse): RequestEnvelope<F>;
}
