import { NotSupportedError } from '../errors/connectorErrors.js';
import type { FlowContract } from '../flows/flowContract.js';
import type { Result } from '../flows/result.js';
import type { WebhookPayload } from './signature.js';
import type { WebhookError, WebhookOutcome } from './webhookEventMapper.js';

/** Inbound headers as an HTTP layer hands them over. */
export type WebhookHeaders = Readonly<Record<string, string | readonly string[] | undefined>>;

function headerValue(headers: WebhookHeaders, name: string): string | undefined {
    const wanted = name.toLowerCase();
    const key = Object.keys(headers).find(candidate => candidate.toLowerCase() === wanted);
    if (key === undefined) return undefined;

    const value = headers[key];
    return typeof value === 'string' ? value : value?.[0];
}

/**
 * Verifies, classifies and reconciles one webhook delivery for a connector.
 * Throws NotSupportedError when the connector takes no webhooks.
 */
export function processWebhook(
    adapter: FlowContract,
    rawPayload: WebhookPayload,
    headers: WebhookHeaders,
    secret: string | undefined
): Result<WebhookOutcome, WebhookError> {
    const processor = adapter.webhooks;
    if (!processor) {
        throw new NotSupportedError('Webhooks', adapter.id);
    }
    return processor.process(rawPayload, headerValue(headers, processor.signatureHeader), secret);
}
