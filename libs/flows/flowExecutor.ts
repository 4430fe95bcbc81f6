import { ErrorSanitizer } from '../errors/sanitizer.js';
import { getFlowLogger } from '../logging/logger.js';
import { errorResponseFromConnectorError } from './commonCapabilities.js';
import { markDispatched, withResponse, type RequestEnvelope } from './envelope.js';
import type { FlowContract } from './flowContract.js';
import type { RequestFlow } from './flowKinds.js';
import type { ConnectorRequest, RawResponse } from './http.js';
import { err } from './result.js';

/**
 * Performs the HTTP exchange. Supplied by the caller; the core never opens
 * a connection itself.
 */
export type Transport = (request: ConnectorRequest) => Promise<RawResponse>;

/**
 * Runs one flow invocation end to end: build, hand to the transport, handle
 * the reply.
 *
 * A request that cannot be built (unsupported flow or payment method,
 * missing field, unconvertible amount) yields a Failed envelope without
 * calling the transport. A transport failure propagates to the caller and
 * no response is recorded, since the gateway outcome is unknown.
 */
export async function executeFlow<F extends RequestFlow>(
    adapter: FlowContract,
    envelope: RequestEnvelope<F>,
    transport: Transport
): Promise<RequestEnvelope<F>> {
    const log = getFlowLogger(adapter.id, envelope.flow, envelope.commonData.connectorRequestReferenceId);

    let request: ConnectorRequest;
    try {
        request = adapter.buildRequest(envelope);
    } catch (error) {
        const sanitized = ErrorSanitizer.sanitize(error, `${adapter.id}:${envelope.flow}:build`);
        log.warn({ code: sanitized.code }, 'Connector request could not be built');
        return withResponse(envelope, err(errorResponseFromConnectorError(sanitized)));
    }

    const dispatched = markDispatched(envelope);
    log.debug({ method: request.method, url: request.url }, 'Dispatching connector request');

    const raw = await transport(request);
    const completed = adapter.handleResponse(dispatched, raw);

    log.info({
        statusCode: raw.statusCode,
        phase: completed.phase,
        status: completed.commonData.status
    }, 'Connector flow completed');

    return completed;
}
