/**
 * ConnectorAdapter: the harness every gateway plugs into.
 *
 * A connector supplies a ConnectorDefinition (vocabularies, error codes,
 * payment-method handlers and one FlowDefinition per supported flow). The
 * harness supplies everything around it: URL joining, headers and signing,
 * body credentials, status reconciliation, error classification and the
 * write-once envelope update.
 */

import { getAmountConverter, type AmountConverter, type UnitKind } from '../amount/amountConverter.js';
import { baseUrlFor, type ConnectorConfig, type ConnectorEnvironment } from '../config/connectorConfig.js';
import { ConfigurationError, NotSupportedError, ResponseAlreadySetError } from '../errors/connectorErrors.js';
import type { ErrorResponse } from '../errors/errorKinds.js';
import { ErrorTaxonomyMapper, type ErrorCodeTable, type RawError } from '../errors/errorTaxonomyMapper.js';
import { ErrorSanitizer, sanitizeGatewayMessage } from '../errors/sanitizer.js';
import { getFlowLogger } from '../logging/logger.js';
import { PaymentMethodDispatcher, type PaymentMethodHandlers } from '../paymentMethods/dispatcher.js';
import { StatusReconciler, type ConnectorStatusVocabulary } from '../status/statusReconciler.js';
import { advanceAttemptStatus, type AttemptStatus } from '../status/statuses.js';
import { WebhookEventMapper, type Clock, type WebhookDefinition } from '../webhooks/webhookEventMapper.js';
import { CommonCapabilities, errorResponseFromConnectorError } from './commonCapabilities.js';
import { withResponse, type RequestEnvelope } from './envelope.js';
import type { FlowContract } from './flowContract.js';
import type { FlowResponse } from './flowData.js';
import type { FlowHandler, FlowOutcome, FlowTable, ParseFailure } from './flowDefinition.js';
import { REQUEST_FLOWS, type RequestFlow } from './flowKinds.js';
import { isSuccessStatus, joinUrl, serializeBody, type ConnectorRequest, type RawResponse, type RequestBody } from './http.js';
import { err, ok, type Result } from './result.js';
import { RESPONSE_MAPPERS, type ResponseMapper } from './responseMappers.js';

export const RESPONSE_DESERIALIZATION_FAILED = 'RESPONSE_DESERIALIZATION_FAILED';

/**
 * Everything a flow implementation may consult while building a request or
 * reading a reply.
 */
export interface ConnectorContext<U extends UnitKind, P> {
    readonly connector: string;
    readonly config: ConnectorConfig;
    readonly environment: ConnectorEnvironment;
    readonly baseUrl: string;
    readonly amounts: AmountConverter<U>;
    readonly paymentMethods: PaymentMethodDispatcher<P>;
    readonly capabilities: CommonCapabilities;
}

export interface ConnectorDefinition<U extends UnitKind, P, W> {
    readonly id: string;
    readonly displayName: string;
    readonly amountUnit: U;
    readonly statusVocabulary: ConnectorStatusVocabulary;
    readonly errorCodes: ErrorCodeTable;
    /** Structured error fields from an error body; undefined when the body has none */
    parseError(body: string): RawError | undefined;
    readonly paymentMethods: PaymentMethodHandlers<P>;
    readonly flows: FlowTable<ConnectorContext<U, P>>;
    readonly webhooks?: WebhookDefinition<W>;
}

export interface AdapterOptions {
    readonly environment: ConnectorEnvironment;
    /** Clock for webhook replay checks */
    readonly clock?: Clock;
}

export class ConnectorAdapter<U extends UnitKind, P, W> implements FlowContract {
    readonly id: string;
    readonly displayName: string;
    readonly amountUnit: U;
    readonly webhooks?: WebhookEventMapper<W>;

    private readonly context: ConnectorContext<U, P>;
    private readonly reconciler: StatusReconciler;

    constructor(
        private readonly definition: ConnectorDefinition<U, P, W>,
        config: ConnectorConfig,
        options: AdapterOptions
    ) {
        if (config.id !== definition.id) {
            throw new ConfigurationError(`Configuration for ${config.id} given to the ${definition.id} connector`);
        }

        this.id = definition.id;
        this.displayName = definition.displayName;
        this.amountUnit = definition.amountUnit;
        this.reconciler = new StatusReconciler(definition.id, definition.statusVocabulary);

        this.context = {
            connector: definition.id,
            config,
            environment: options.environment,
            baseUrl: baseUrlFor(config, options.environment),
            amounts: getAmountConverter(definition.amountUnit),
            paymentMethods: new PaymentMethodDispatcher(definition.id, definition.paymentMethods),
            capabilities: new CommonCapabilities(definition.id, config, new ErrorTaxonomyMapper(definition.id, definition.errorCodes))
        };

        if (definition.webhooks) {
            this.webhooks = new WebhookEventMapper(definition.id, definition.webhooks, this.reconciler, {
                signatureHeader: config.webhookSignatureHeader,
                clock: options.clock
            });
        }
    }

    supports(flow: RequestFlow): boolean {
        return this.definition.flows[flow] !== undefined;
    }

    supportedFlows(): readonly RequestFlow[] {
        return REQUEST_FLOWS.filter(flow => this.supports(flow));
    }

    url<F extends RequestFlow>(envelope: RequestEnvelope<F>): string {
        return joinUrl(this.context.baseUrl, this.handler(envelope.flow).path(envelope, this.context));
    }

    body<F extends RequestFlow>(envelope: RequestEnvelope<F>): RequestBody {
        const body = this.handler(envelope.flow).body(envelope, this.context);
        return this.context.capabilities.withBodyCredentials(body, envelope.commonData.connectorAuth);
    }

    headers<F extends RequestFlow>(envelope: RequestEnvelope<F>): Readonly<Record<string, string>> {
        return this.buildRequest(envelope).headers;
    }

    buildRequest<F extends RequestFlow>(envelope: RequestEnvelope<F>): ConnectorRequest {
        const handler = this.handler(envelope.flow);
        const url = this.url(envelope);
        const body = this.body(envelope);
        const serialized = serializeBody(body);
        const { commonData } = envelope;

        const headers = this.context.capabilities.buildHeaders({
            auth: commonData.connectorAuth,
            body,
            signing: { method: handler.method, url, body: serialized, timestamp: commonData.requestTimestamp },
            idempotencyKey: commonData.idempotencyKey,
            extra: handler.headers(envelope, this.context)
        });

        return serialized === undefined
            ? { method: handler.method, url, headers }
            : { method: handler.method, url, headers, body: serialized };
    }

    handleResponse<F extends RequestFlow>(envelope: RequestEnvelope<F>, raw: RawResponse): RequestEnvelope<F> {
        if (envelope.response) {
            throw new ResponseAlreadySetError(envelope.flow);
        }
        if (!isSuccessStatus(raw.statusCode)) {
            return this.applyError(envelope, this.handleError(envelope, raw));
        }

        const handler = this.handler(envelope.flow);
        const log = getFlowLogger(this.id, envelope.flow, envelope.commonData.connectorRequestReferenceId);

        let parsed: Result<FlowOutcome<F>, ParseFailure>;
        try {
            parsed = handler.parse(raw.body, envelope, this.context);
        } catch (error) {
            const sanitized = ErrorSanitizer.sanitize(error, `${this.id}:${envelope.flow}:response`);
            return withResponse(envelope, err({ ...errorResponseFromConnectorError(sanitized), statusCode: raw.statusCode }));
        }

        if (!parsed.ok) {
            if (parsed.error.type === 'rejected') {
                return this.applyError(envelope, this.context.capabilities.errorResponse(parsed.error.error, raw.statusCode, envelope.flow));
            }
            log.warn({ statusCode: raw.statusCode, detail: parsed.error.detail }, 'Gateway response could not be deserialized');
            return withResponse(envelope, err({
                statusCode: raw.statusCode,
                code: RESPONSE_DESERIALIZATION_FAILED,
                message: 'Gateway response could not be deserialized',
                reason: sanitizeGatewayMessage(parsed.error.detail),
                kind: 'Unknown'
            }));
        }

        const mapper: ResponseMapper<F> = RESPONSE_MAPPERS[envelope.flow];
        const mapped = mapper.fromOutcome(envelope, parsed.value, this.reconciler);
        return this.complete(envelope, ok(mapped.response), mapped.status);
    }

    handleError<F extends RequestFlow>(envelope: RequestEnvelope<F>, raw: RawResponse): ErrorResponse {
        let rawError: RawError | undefined;
        try {
            rawError = this.definition.parseError(raw.body);
        } catch (error) {
            getFlowLogger(this.id, envelope.flow).warn({
                statusCode: raw.statusCode,
                reason: error instanceof Error ? error.message : String(error)
            }, 'Error body could not be read');
            rawError = undefined;
        }
        return this.context.capabilities.errorResponse(rawError ?? {}, raw.statusCode, envelope.flow);
    }

    applyError<F extends RequestFlow>(envelope: RequestEnvelope<F>, error: ErrorResponse): RequestEnvelope<F> {
        if (error.kind === 'AlreadyProcessed') {
            const mapper: ResponseMapper<F> = RESPONSE_MAPPERS[envelope.flow];
            const replay = mapper.fromAlreadyProcessed(envelope, error);
            if (replay) {
                getFlowLogger(this.id, envelope.flow, envelope.commonData.connectorRequestReferenceId)
                    .info({ code: error.code, status: replay.status }, 'Gateway reports operation already applied');
                return this.complete(envelope, ok(replay.response), replay.status);
            }
        }
        return this.complete(envelope, err(error), error.attemptStatus);
    }

    private complete<F extends RequestFlow>(
        envelope: RequestEnvelope<F>,
        response: Result<FlowResponse<F>, ErrorResponse>,
        proposedStatus: AttemptStatus | undefined
    ): RequestEnvelope<F> {
        const current = envelope.commonData.status;
        if (proposedStatus !== undefined && !advanceAttemptStatus(current, proposedStatus).applied) {
            getFlowLogger(this.id, envelope.flow, envelope.commonData.connectorRequestReferenceId)
                .warn({ current, proposed: proposedStatus }, 'Status regression refused; keeping recorded status');
        }
        return withResponse(envelope, response, proposedStatus);
    }

    private handler<F extends RequestFlow>(flow: F): FlowHandler<F, ConnectorContext<U, P>> {
        const handler = this.definition.flows[flow];
        if (!handler) {
            throw new NotSupportedError(`Flow ${flow}`, this.id);
        }
        return handler;
    }
}
