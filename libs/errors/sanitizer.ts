import { logger } from '../logging/logger.js';
import crypto from 'crypto';
import { ConnectorError } from './connectorErrors.js';

/**
 * Error information disclosure prevention.
 * Unexpected failures inside a transformer are wrapped in a generic error
 * carrying an incidentId; the internal details go to the log only.
 */
export class InternalConnectorError extends ConnectorError {
    public readonly incidentId: string;
    public readonly contextLabel: string;

    constructor(
        public readonly publicMessage: string,
        contextLabel: string,
        internalDetails?: unknown,
        options?: { cause?: unknown }
    ) {
        super('INTERNAL_ERROR', publicMessage, options);
        this.name = 'InternalConnectorError';
        this.incidentId = crypto.randomUUID();
        this.contextLabel = contextLabel;

        logger.error({
            incidentId: this.incidentId,
            contextLabel,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

const MAX_MESSAGE_LENGTH = 500;

/**
 * Removes credentials and card data a gateway may echo back in its error text.
 */
export function sanitizeGatewayMessage(message: string | undefined): string | undefined {
    if (message === undefined) return undefined;

    return message
        .replace(/password[=:]\s*\S+/gi, 'password=[REDACTED]')
        .replace(/token[=:]\s*\S+/gi, 'token=[REDACTED]')
        .replace(/key[=:]\s*\S+/gi, 'key=[REDACTED]')
        .replace(/secret[=:]\s*\S+/gi, 'secret=[REDACTED]')
        .replace(/\b\d{13,19}\b/g, '[REDACTED_PAN]')
        .substring(0, MAX_MESSAGE_LENGTH);
}

export const ErrorSanitizer = {
    /**
     * Passes typed connector errors through and wraps anything else.
     */
    sanitize: (err: unknown, contextLabel: string): ConnectorError => {
        if (err instanceof ConnectorError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else {
            originalErrorMessage = String(err);
        }

        return new InternalConnectorError(
            `An internal connector error occurred (${contextLabel})`,
            contextLabel,
            { originalError: sanitizeGatewayMessage(originalErrorMessage), stack: originalErrorStack },
            { cause: err }
        );
    }
};
