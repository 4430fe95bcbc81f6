/**
 * Cross-flow request and error plumbing shared by every connector.
 *
 * One instance is built per adapter and handed to each flow implementation,
 * so auth headers, body encoding, capture-body rules and error-response
 * construction are written once.
 */

import crypto from 'crypto';
import { logger } from '../logging/logger.js';
import { ConnectorError, MissingRequiredFieldError } from '../errors/connectorErrors.js';
import { NO_ERROR_CODE, NO_ERROR_MESSAGE, type ErrorResponse } from '../errors/errorKinds.js';
import { defaultAttemptStatusHint, type ErrorTaxonomyMapper, type RawError } from '../errors/errorTaxonomyMapper.js';
import { sanitizeGatewayMessage } from '../errors/sanitizer.js';
import type { ConnectorConfig } from '../config/connectorConfig.js';
import { safeValidate, type SchemaOf } from '../validation/zod-middleware.js';
import type { ConnectorAuth } from './envelope.js';
import type { CaptureData, HttpMethod } from './flowData.js';
import type { FlowKind } from './flowKinds.js';
import { Body, contentTypeFor, type RequestBody } from './http.js';

export interface SigningInput {
    readonly method: HttpMethod;
    readonly url: string;
    readonly body?: string;
    readonly timestamp: string;
}

export interface HeaderInput {
    readonly auth: ConnectorAuth;
    readonly body: RequestBody;
    readonly signing: SigningInput;
    readonly idempotencyKey?: string;
    readonly extra?: Readonly<Record<string, string>>;
}

function present(value: string | null | undefined): string | undefined {
    if (value === undefined || value === null || value.trim() === '') return undefined;
    return value;
}

function sha256Hex(payload: string): string {
    return crypto.createHash('sha256').update(payload, 'utf8').digest('hex');
}

export class CommonCapabilities {
    constructor(
        public readonly connector: string,
        private readonly config: ConnectorConfig,
        private readonly mapper: ErrorTaxonomyMapper
    ) {}

    apiKey(auth: ConnectorAuth): string {
        if (auth.type === 'NoKey') {
            throw new MissingRequiredFieldError('connectorAuth.apiKey', this.connector);
        }
        return auth.apiKey;
    }

    key1(auth: ConnectorAuth): string {
        switch (auth.type) {
            case 'BodyKey':
            case 'SignatureKey':
            case 'MultiAuthKey':
                return auth.key1;
            default:
                throw new MissingRequiredFieldError('connectorAuth.key1', this.connector);
        }
    }

    apiSecret(auth: ConnectorAuth): string {
        switch (auth.type) {
            case 'SignatureKey':
            case 'MultiAuthKey':
                return auth.apiSecret;
            default:
                throw new MissingRequiredFieldError('connectorAuth.apiSecret', this.connector);
        }
    }

    /**
     * Headers the configured auth scheme requires. Signed schemes cover the
     * method, path, envelope timestamp and a digest of the body, so the same
     * envelope always yields the same headers.
     */
    authHeaders(auth: ConnectorAuth, signing: SigningInput): Record<string, string> {
        const scheme = this.config.authScheme;
        switch (scheme.type) {
            case 'bearer':
                return { Authorization: `Bearer ${this.apiKey(auth)}` };
            case 'basic': {
                const user = this.apiKey(auth);
                const password = auth.type === 'HeaderKey' ? '' : this.key1(auth);
                return { Authorization: `Basic ${Buffer.from(`${user}:${password}`).toString('base64')}` };
            }
            case 'header':
                return { [scheme.name]: this.apiKey(auth) };
            case 'hmac': {
                const { pathname, search } = new URL(signing.url);
                const message = [signing.method, `${pathname}${search}`, signing.timestamp, sha256Hex(signing.body ?? '')].join('\n');
                const signature = crypto.createHmac(scheme.algorithm, this.apiSecret(auth)).update(message, 'utf8').digest('hex');
                return {
                    [scheme.keyIdHeader]: this.apiKey(auth),
                    [scheme.timestampHeader]: signing.timestamp,
                    [scheme.signatureHeader]: signature
                };
            }
            case 'body':
            case 'none':
                return {};
        }
    }

    /**
     * Adds credentials to the body for gateways that authenticate in the payload.
     */
    withBodyCredentials(body: RequestBody, auth: ConnectorAuth): RequestBody {
        const scheme = this.config.authScheme;
        if (scheme.type !== 'body') return body;

        const credentials: Record<string, string> = { [scheme.keyField]: this.apiKey(auth) };
        if (scheme.secretField) {
            credentials[scheme.secretField] = this.key1(auth);
        }

        switch (body.kind) {
            case 'json':
                return Body.json({ ...body.value, ...credentials });
            case 'form':
                return Body.form({ ...body.value, ...credentials });
            case 'empty_object':
            case 'none':
                return Body.json(credentials);
            case 'xml':
                throw new MissingRequiredFieldError('authScheme.xmlCredentials', this.connector);
        }
    }

    buildHeaders(input: HeaderInput): Record<string, string> {
        const headers: Record<string, string> = { Accept: 'application/json' };

        const contentType = contentTypeFor(input.body);
        if (contentType) {
            headers['Content-Type'] = contentType;
        }
        if (this.config.idempotencyHeader && input.idempotencyKey) {
            headers[this.config.idempotencyHeader] = input.idempotencyKey;
        }

        return {
            ...headers,
            ...this.authHeaders(input.auth, input.signing),
            ...input.extra
        };
    }

    /**
     * Capture body: a full capture on a gateway flagged for it is `{}`,
     * anything else is the flow's own body.
     */
    captureBody(request: CaptureData, partial: () => RequestBody): RequestBody {
        if (request.amountToCapture === request.paymentAmount && this.config.requiresEmptyObjectForFullCapture) {
            return Body.emptyObject();
        }
        return partial();
    }

    /**
     * Builds the ErrorResponse for a gateway error. Pure: the same inputs give
     * the same value.
     */
    errorResponse(rawError: RawError, statusCode: number, flow: FlowKind): ErrorResponse {
        const classification = this.mapper.map(rawError, statusCode);

        return {
            statusCode,
            code: classification.rawCode ?? NO_ERROR_CODE,
            message: sanitizeGatewayMessage(present(rawError.message)) ?? NO_ERROR_MESSAGE,
            reason: sanitizeGatewayMessage(present(rawError.reason)),
            kind: classification.kind,
            attemptStatus: classification.attemptStatus ?? defaultAttemptStatusHint(classification.kind, flow),
            refundStatus: classification.refundStatus,
            connectorTransactionId: present(rawError.connectorTransactionId),
            connectorRefundId: present(rawError.connectorRefundId),
            networkDeclineCode: present(rawError.networkDeclineCode),
            networkAdviceCode: present(rawError.networkAdviceCode),
            networkErrorMessage: sanitizeGatewayMessage(present(rawError.networkErrorMessage))
        };
    }
}

/**
 * ErrorResponse for a failure raised before or instead of a gateway call.
 * The status codes are pseudo codes: nothing was sent.
 */
export function errorResponseFromConnectorError(error: ConnectorError): ErrorResponse {
    const message = sanitizeGatewayMessage(error.message) ?? NO_ERROR_MESSAGE;

    switch (error.code) {
        case 'NOT_SUPPORTED':
            return { statusCode: 501, code: error.code, message, kind: 'NotSupported' };
        case 'MISSING_REQUIRED_FIELD':
            return {
                statusCode: 400,
                code: error.code,
                message,
                reason: error instanceof MissingRequiredFieldError ? error.fieldName : undefined,
                kind: 'Validation'
            };
        case 'AMOUNT_CONVERSION_FAILED':
        case 'VALIDATION_FAILED':
            return { statusCode: 400, code: error.code, message, kind: 'Validation' };
        default:
            return { statusCode: 500, code: error.code, message, kind: 'Unknown' };
    }
}

/**
 * Error extractor for gateways that return JSON error bodies. A body that is
 * not JSON, or does not match the schema, yields no structured error.
 */
export function jsonErrorParser<E>(
    connector: string,
    schema: SchemaOf<E>,
    toRawError: (error: E) => RawError
): (body: string) => RawError | undefined {
    return (body: string) => {
        if (body.trim() === '') return undefined;

        let parsed: unknown;
        try {
            parsed = JSON.parse(body);
        } catch (error) {
            logger.debug({ connector, reason: error instanceof Error ? error.message : String(error) }, 'Error body is not JSON');
            return undefined;
        }

        const result = safeValidate(schema, parsed, `${connector}:error`);
        return result.ok ? toRawError(result.value) : undefined;
    };
}
