/**
 * Typed errors raised while building a connector request or verifying a
 * webhook. None of them is retried by the core; the caller decides.
 */

export type ConnectorErrorCode =
    | 'AMOUNT_CONVERSION_FAILED'
    | 'SIGNATURE_INVALID'
    | 'MISSING_REQUIRED_FIELD'
    | 'NOT_SUPPORTED'
    | 'RESPONSE_ALREADY_SET'
    | 'CONFIGURATION_INVALID'
    | 'VALIDATION_FAILED'
    | 'WEBHOOK_PAYLOAD_INVALID'
    | 'INTERNAL_ERROR';

export class ConnectorError extends Error {
    public override cause?: unknown;

    constructor(
        public readonly code: ConnectorErrorCode,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message);
        this.name = 'ConnectorError';
        this.cause = options?.cause;
    }
}

export class AmountConversionError extends ConnectorError {
    constructor(
        message: string,
        public readonly currency: string,
        public readonly unit: string
    ) {
        super('AMOUNT_CONVERSION_FAILED', message);
        this.name = 'AmountConversionError';
    }
}

export type SignatureFailureReason =
    | 'missing_header'
    | 'malformed_header'
    | 'missing_secret'
    | 'mismatch'
    | 'timestamp_out_of_tolerance';

export class SignatureError extends ConnectorError {
    constructor(
        public readonly reason: SignatureFailureReason,
        public readonly connector: string
    ) {
        super('SIGNATURE_INVALID', `Webhook signature rejected for ${connector}: ${reason}`);
        this.name = 'SignatureError';
    }
}

export class MissingRequiredFieldError extends ConnectorError {
    constructor(
        public readonly fieldName: string,
        public readonly connector?: string
    ) {
        super(
            'MISSING_REQUIRED_FIELD',
            connector
                ? `Missing required field ${fieldName} for ${connector}`
                : `Missing required field ${fieldName}`
        );
        this.name = 'MissingRequiredFieldError';
    }
}

export class NotSupportedError extends ConnectorError {
    constructor(
        public readonly feature: string,
        public readonly connector: string
    ) {
        super('NOT_SUPPORTED', `${feature} is not supported by ${connector}`);
        this.name = 'NotSupportedError';
    }
}

export class ResponseAlreadySetError extends ConnectorError {
    constructor(flow: string) {
        super('RESPONSE_ALREADY_SET', `Response for ${flow} envelope has already been populated`);
        this.name = 'ResponseAlreadySetError';
    }
}

export class ConfigurationError extends ConnectorError {
    constructor(
        message: string,
        public readonly violations: readonly string[] = []
    ) {
        super('CONFIGURATION_INVALID', message);
        this.name = 'ConfigurationError';
    }
}

export interface ValidationIssue {
    readonly path: string;
    readonly message: string;
}

export class ValidationError extends ConnectorError {
    constructor(
        public readonly context: string,
        public readonly issues: readonly ValidationIssue[]
    ) {
        super('VALIDATION_FAILED', `Validation failed in ${context}: ${issues.map(i => `${i.path || '(root)'} ${i.message}`).join('; ')}`);
        this.name = 'ValidationError';
    }
}

export class WebhookPayloadError extends ConnectorError {
    constructor(
        public readonly connector: string,
        detail: string,
        options?: { cause?: unknown }
    ) {
        super('WEBHOOK_PAYLOAD_INVALID', `Webhook payload from ${connector} could not be decoded: ${detail}`, options);
        this.name = 'WebhookPayloadError';
    }
}

/**
 * Field accessor that turns an absent value into MissingRequiredFieldError.
 */
export function requireField<T>(value: T | null | undefined, fieldName: string, connector?: string): T {
    if (value === undefined || value === null || (typeof value === 'string' && value.trim() === '')) {
        throw new MissingRequiredFieldError(fieldName, connector);
    }
    return value;
}
