/**
 * Inbound webhook handling: verify, then extract the reference, then classify.
 *
 * Verification runs over the exact received bytes and always comes first;
 * nothing about a payload is read or logged before its signature passes.
 * Event types the connector does not map resolve to EventNotSupported, so a
 * delivery is never rejected only because the event is not acted on.
 */

import { logger } from '../logging/logger.js';
import { AmountConversionError, WebhookPayloadError, type SignatureError } from '../errors/connectorErrors.js';
import { err, ok, type Result } from '../flows/result.js';
import type { AttemptStatus, DisputeStatus, RefundStatus } from '../status/statuses.js';
import { isPartialCapture, type RawStatus, type ReconcileContext, type StatusReconciler } from '../status/statusReconciler.js';
import { safeValidate, type SchemaOf } from '../validation/zod-middleware.js';
import { verifySignature, type SignatureScheme, type WebhookPayload } from './signature.js';

export const CANONICAL_WEBHOOK_EVENTS = [
    'PaymentAuthorized',
    'PaymentCaptured',
    'PaymentFailed',
    'PaymentCancelled',
    'RefundSucceeded',
    'RefundFailed',
    'DisputeOpened',
    'DisputeWon',
    'DisputeLost',
    'EventNotSupported'
] as const;

export type CanonicalWebhookEvent = typeof CANONICAL_WEBHOOK_EVENTS[number];

export type ObjectReferenceId =
    | { readonly type: 'payment'; readonly idType: 'connector_transaction_id' | 'payment_attempt_id' | 'connector_request_reference_id'; readonly id: string }
    | { readonly type: 'refund'; readonly idType: 'connector_refund_id' | 'refund_id'; readonly id: string }
    | { readonly type: 'dispute'; readonly idType: 'connector_dispute_id'; readonly id: string };

export type WebhookStatus =
    | { readonly family: 'payment'; readonly status: AttemptStatus }
    | { readonly family: 'refund'; readonly status: RefundStatus }
    | { readonly family: 'dispute'; readonly status: DisputeStatus };

/**
 * Status an event implies when the payload carries no status of its own.
 */
const EVENT_STATUS: Readonly<Record<Exclude<CanonicalWebhookEvent, 'EventNotSupported'>, WebhookStatus>> = {
    PaymentAuthorized: { family: 'payment', status: 'Authorized' },
    PaymentCaptured: { family: 'payment', status: 'Charged' },
    PaymentFailed: { family: 'payment', status: 'Failure' },
    PaymentCancelled: { family: 'payment', status: 'Voided' },
    RefundSucceeded: { family: 'refund', status: 'Success' },
    RefundFailed: { family: 'refund', status: 'Failure' },
    DisputeOpened: { family: 'dispute', status: 'Opened' },
    DisputeWon: { family: 'dispute', status: 'Won' },
    DisputeLost: { family: 'dispute', status: 'Lost' }
};

/** Amounts a payload states, in minor units. */
export type WebhookAmounts = Pick<ReconcileContext, 'authorizedAmount' | 'capturedAmount'>;

export interface WebhookDefinition<P> {
    readonly signature: SignatureScheme;
    /** Header the gateway puts the signature in */
    readonly signatureHeader: string;
    readonly payloadSchema: SchemaOf<P>;
    eventType(payload: P): string;
    /** Gateway event type to canonical event; keys compare case-insensitively */
    readonly events: Readonly<Record<string, CanonicalWebhookEvent>>;
    extractReference(payload: P): ObjectReferenceId;
    /** Status as the gateway states it in the payload, fed through the reconciler */
    rawStatus?(payload: P): RawStatus | undefined;
    /** May throw AmountConversionError for an amount the payload states badly */
    amounts?(payload: P): WebhookAmounts | undefined;
}

export interface WebhookOutcome {
    readonly event: CanonicalWebhookEvent;
    readonly eventType: string;
    readonly reference: ObjectReferenceId;
    readonly status?: WebhookStatus;
}

export type WebhookError = SignatureError | WebhookPayloadError;

/**
 * Connector-agnostic view of a webhook mapper.
 */
export interface WebhookProcessor {
    readonly connector: string;
    readonly signatureHeader: string;
    verify(rawPayload: WebhookPayload, signatureHeader: string | undefined, secret: string | undefined): Result<void, SignatureError>;
    process(rawPayload: WebhookPayload, signatureHeader: string | undefined, secret: string | undefined): Result<WebhookOutcome, WebhookError>;
}

export type Clock = () => Date;

export interface WebhookMapperOptions {
    /** Replaces the definition's signature header */
    readonly signatureHeader?: string;
    readonly clock?: Clock;
}

export class WebhookEventMapper<P> implements WebhookProcessor {
    readonly signatureHeader: string;
    private readonly events: ReadonlyMap<string, CanonicalWebhookEvent>;
    private readonly clock: Clock;

    constructor(
        public readonly connector: string,
        private readonly definition: WebhookDefinition<P>,
        private readonly reconciler: StatusReconciler,
        options: WebhookMapperOptions = {}
    ) {
        this.signatureHeader = options.signatureHeader ?? definition.signatureHeader;
        this.clock = options.clock ?? (() => new Date());
        this.events = new Map(
            Object.entries(definition.events).map(([type, event]) => [type.trim().toLowerCase(), event])
        );
    }

    verify(rawPayload: WebhookPayload, signatureHeader: string | undefined, secret: string | undefined): Result<void, SignatureError> {
        const result = verifySignature(this.definition.signature, this.connector, rawPayload, signatureHeader, secret, this.clock());
        if (!result.ok) {
            logger.warn({ connector: this.connector, reason: result.error.reason }, 'Webhook signature rejected');
        }
        return result;
    }

    /** Decodes a payload whose signature already passed. */
    parse(rawPayload: WebhookPayload): Result<P, WebhookPayloadError> {
        let decoded: unknown;
        try {
            decoded = JSON.parse(typeof rawPayload === 'string' ? rawPayload : rawPayload.toString('utf8'));
        } catch (error) {
            return err(new WebhookPayloadError(this.connector, 'body is not JSON', { cause: error }));
        }

        const validated = safeValidate(this.definition.payloadSchema, decoded, `${this.connector}:webhook`);
        return validated.ok
            ? ok(validated.value)
            : err(new WebhookPayloadError(this.connector, validated.error.message, { cause: validated.error }));
    }

    extractReference(payload: P): ObjectReferenceId {
        return this.definition.extractReference(payload);
    }

    classify(payload: P): CanonicalWebhookEvent {
        const eventType = this.definition.eventType(payload);
        const event = this.events.get(eventType.trim().toLowerCase());
        if (event === undefined) {
            logger.info({ connector: this.connector, eventType }, 'Webhook event type not mapped');
            return 'EventNotSupported';
        }
        return event;
    }

    amountsOf(payload: P): Result<WebhookAmounts, WebhookPayloadError> {
        try {
            return ok<WebhookAmounts>(this.definition.amounts?.(payload) ?? {});
        } catch (error) {
            if (error instanceof AmountConversionError) {
                return err(new WebhookPayloadError(this.connector, error.message, { cause: error }));
            }
            throw error;
        }
    }

    /**
     * Status the event carries, reconciled the same way a sync response is.
     * A settled amount below the authorised one reports PartialCharged.
     */
    statusFor(payload: P, event: CanonicalWebhookEvent, amounts: WebhookAmounts = {}): WebhookStatus | undefined {
        if (event === 'EventNotSupported') return undefined;

        const context: ReconcileContext = { flow: 'Webhook', ...amounts };
        const implied = EVENT_STATUS[event];
        const raw = this.definition.rawStatus?.(payload);
        if (raw === undefined) {
            return implied.family === 'payment' && implied.status === 'Charged' && isPartialCapture(context)
                ? { family: 'payment', status: 'PartialCharged' }
                : implied;
        }

        switch (implied.family) {
            case 'payment':
                return { family: 'payment', status: this.reconciler.reconcilePayment(raw, context).status };
            case 'refund':
                return { family: 'refund', status: this.reconciler.reconcileRefund(raw, context).status };
            case 'dispute':
                return { family: 'dispute', status: this.reconciler.reconcileDispute(raw, context).status };
        }
    }

    /**
     * Full pipeline. A payload whose signature fails is never parsed or classified.
     */
    process(rawPayload: WebhookPayload, signatureHeader: string | undefined, secret: string | undefined): Result<WebhookOutcome, WebhookError> {
        const verified = this.verify(rawPayload, signatureHeader, secret);
        if (!verified.ok) return verified;

        const parsed = this.parse(rawPayload);
        if (!parsed.ok) return parsed;

        const payload = parsed.value;
        const amounts = this.amountsOf(payload);
        if (!amounts.ok) return amounts;

        const event = this.classify(payload);
        const outcome: WebhookOutcome = {
            event,
            eventType: this.definition.eventType(payload),
            reference: this.extractReference(payload),
            status: this.statusFor(payload, event, amounts.value)
        };

        logger.info({
            connector: this.connector,
            event: outcome.event,
            referenceType: outcome.reference.type
        }, 'Webhook processed');

        return ok(outcome);
    }
}
