/**
 * Status reconciliation.
 *
 * Maps whatever a gateway calls a status (a word in arbitrary casing, a
 * success flag with a reason code, or a numeric code) to the canonical
 * status for the flow being handled. The mapping is total: an input nobody
 * recognises reconciles to the initial status of its family and is logged,
 * never dropped.
 */

import { logger } from '../logging/logger.js';
import { ConfigurationError } from '../errors/connectorErrors.js';
import type { MinorUnit } from '../amount/amountConverter.js';
import { isDisputeFlow, isRefundFlow, type FlowKind } from '../flows/flowKinds.js';
import type { AttemptStatus, DisputeStatus, RefundStatus } from './statuses.js';

export type CaptureMethod = 'automatic' | 'manual';

export type RawStatus =
    | { readonly kind: 'text'; readonly value: string }
    | { readonly kind: 'flag'; readonly success: boolean; readonly reasonCode?: string | number | null }
    | { readonly kind: 'code'; readonly value: number | string };

export const rawStatus = {
    text: (value: string): RawStatus => ({ kind: 'text', value }),
    flag: (success: boolean, reasonCode?: string | number | null): RawStatus => ({ kind: 'flag', success, reasonCode }),
    code: (value: number | string): RawStatus => ({ kind: 'code', value })
};

export interface ReconcileContext {
    readonly flow: FlowKind;
    readonly captureMethod?: CaptureMethod;
    /** Amount originally authorised, in minor units */
    readonly authorizedAmount?: MinorUnit;
    /** Amount the gateway reports as captured or settled, in minor units */
    readonly capturedAmount?: MinorUnit;
}

export type StatusMapping<S extends string> = S | ((context: ReconcileContext) => S);

export interface FlagVocabulary<S extends string> {
    readonly success: StatusMapping<S>;
    readonly failure: StatusMapping<S>;
    /** Reason codes that override the plain success/failure mapping */
    readonly reasons?: Readonly<Record<string, StatusMapping<S>>>;
}

export interface StatusVocabulary<S extends string> {
    readonly text?: Readonly<Record<string, StatusMapping<S>>>;
    readonly codes?: Readonly<Record<string, StatusMapping<S>>>;
    readonly flag?: FlagVocabulary<S>;
}

export interface ConnectorStatusVocabulary {
    readonly payment: StatusVocabulary<AttemptStatus>;
    readonly refund?: StatusVocabulary<RefundStatus>;
    readonly dispute?: StatusVocabulary<DisputeStatus>;
}

export type MatchSource = 'connector' | 'generic' | 'default';

export interface Reconciled<S> {
    readonly status: S;
    readonly matchedBy: MatchSource;
    /** Printable form of the raw status, for diagnostics */
    readonly raw: string;
    /** True when a gateway "charged" was downgraded because less than the authorised amount settled */
    readonly partialCaptureOverride: boolean;
}

export type CanonicalStatus = AttemptStatus | RefundStatus | DisputeStatus;

/**
 * Lower-cases and strips separators so "Sent_For_Settlement",
 * "sent-for-settlement" and "sentForSettlement" compare equal.
 */
export function normalizeStatusToken(value: string): string {
    return value.trim().toLowerCase().replace(/[\s_\-.]/g, '');
}

export function describeRawStatus(raw: RawStatus): string {
    switch (raw.kind) {
        case 'text':
            return raw.value;
        case 'code':
            return `code:${raw.value}`;
        case 'flag':
            return raw.reasonCode === undefined || raw.reasonCode === null
                ? `flag:${raw.success}`
                : `flag:${raw.success}:${raw.reasonCode}`;
    }
}

/**
 * Status a flow reaches when the gateway simply says "success".
 */
export function successStatusFor(context: ReconcileContext): AttemptStatus {
    switch (context.flow) {
        case 'Authorize':
            return context.captureMethod === 'manual' ? 'Authorized' : 'Charged';
        case 'Void':
            return 'Voided';
        case 'CreateOrder':
            return 'Pending';
        default:
            return 'Charged';
    }
}

/**
 * Status a flow reaches when the gateway simply says "failed".
 */
export function failureStatusFor(context: ReconcileContext): AttemptStatus {
    switch (context.flow) {
        case 'Authorize':
        case 'SetupMandate':
            return 'AuthorizationFailed';
        case 'Void':
            return 'VoidFailed';
        default:
            return 'Failure';
    }
}

function disputeSuccessFor(context: ReconcileContext): DisputeStatus {
    return context.flow === 'AcceptDispute' ? 'Accepted' : 'Challenged';
}

const GENERIC_PAYMENT_TEXT: Readonly<Record<string, StatusMapping<AttemptStatus>>> = {
    success: successStatusFor,
    succeeded: successStatusFor,
    successful: successStatusFor,
    completed: successStatusFor,
    approved: successStatusFor,
    authorized: 'Authorized',
    authorised: 'Authorized',
    captured: 'Charged',
    settled: 'Charged',
    pending: 'Pending',
    processing: 'Pending',
    inprogress: 'Pending',
    created: 'Pending',
    failed: failureStatusFor,
    failure: failureStatusFor,
    declined: failureStatusFor,
    refused: failureStatusFor,
    error: failureStatusFor,
    cancelled: 'Voided',
    canceled: 'Voided',
    voided: 'Voided'
};

const GENERIC_REFUND_TEXT: Readonly<Record<string, StatusMapping<RefundStatus>>> = {
    success: 'Success',
    succeeded: 'Success',
    successful: 'Success',
    completed: 'Success',
    refunded: 'Success',
    pending: 'Pending',
    processing: 'Pending',
    inprogress: 'Pending',
    failed: 'Failure',
    failure: 'Failure',
    declined: 'Failure',
    rejected: 'Failure',
    error: 'Failure'
};

const GENERIC_DISPUTE_TEXT: Readonly<Record<string, StatusMapping<DisputeStatus>>> = {
    open: 'Opened',
    opened: 'Opened',
    challenged: 'Challenged',
    underreview: 'Challenged',
    expired: 'Expired',
    accepted: 'Accepted',
    cancelled: 'Cancelled',
    canceled: 'Cancelled',
    won: 'Won',
    lost: 'Lost'
};

interface CompiledVocabulary<S extends string> {
    readonly text: ReadonlyMap<string, StatusMapping<S>>;
    readonly codes: ReadonlyMap<string, StatusMapping<S>>;
    readonly flag?: {
        readonly success: StatusMapping<S>;
        readonly failure: StatusMapping<S>;
        readonly reasons: ReadonlyMap<string, StatusMapping<S>>;
    };
}

interface Family<S extends string> {
    readonly name: string;
    readonly initial: S;
    readonly genericText: ReadonlyMap<string, StatusMapping<S>>;
    readonly flagSuccess: StatusMapping<S>;
    readonly flagFailure: StatusMapping<S>;
}

function compileTable<S extends string>(
    connector: string,
    table: Readonly<Record<string, StatusMapping<S>>> | undefined,
    normalize: (key: string) => string
): Map<string, StatusMapping<S>> {
    const compiled = new Map<string, StatusMapping<S>>();
    if (!table) return compiled;
    for (const [key, mapping] of Object.entries(table)) {
        const normalized = normalize(key);
        const existing = compiled.get(normalized);
        if (existing !== undefined && existing !== mapping) {
            throw new ConfigurationError(
                `Status vocabulary for ${connector} maps "${normalized}" to two different statuses`
            );
        }
        compiled.set(normalized, mapping);
    }
    return compiled;
}

function compileVocabulary<S extends string>(connector: string, vocabulary: StatusVocabulary<S> | undefined): CompiledVocabulary<S> {
    const normalizeCode = (key: string) => key.trim();
    return {
        text: compileTable(connector, vocabulary?.text, normalizeStatusToken),
        codes: compileTable(connector, vocabulary?.codes, normalizeCode),
        flag: vocabulary?.flag && {
            success: vocabulary.flag.success,
            failure: vocabulary.flag.failure,
            reasons: compileTable(connector, vocabulary.flag.reasons, normalizeCode)
        }
    };
}

function resolveMapping<S extends string>(mapping: StatusMapping<S>, context: ReconcileContext): S {
    return typeof mapping === 'function' ? mapping(context) : mapping;
}

const PAYMENT_FAMILY: Family<AttemptStatus> = {
    name: 'payment',
    initial: 'Pending',
    genericText: new Map(Object.entries(GENERIC_PAYMENT_TEXT)),
    flagSuccess: successStatusFor,
    flagFailure: failureStatusFor
};

const REFUND_FAMILY: Family<RefundStatus> = {
    name: 'refund',
    initial: 'Pending',
    genericText: new Map(Object.entries(GENERIC_REFUND_TEXT)),
    flagSuccess: 'Success',
    flagFailure: 'Failure'
};

const DISPUTE_FAMILY: Family<DisputeStatus> = {
    name: 'dispute',
    initial: 'Opened',
    genericText: new Map(Object.entries(GENERIC_DISPUTE_TEXT)),
    flagSuccess: disputeSuccessFor,
    flagFailure: 'Opened'
};

/**
 * Whether a settled amount below the authorised amount turns Charged into
 * PartialCharged. A reported amount of zero counts.
 */
export function isPartialCapture(context: ReconcileContext): boolean {
    const { authorizedAmount, capturedAmount } = context;
    return authorizedAmount !== undefined
        && capturedAmount !== undefined
        && capturedAmount < authorizedAmount;
}

export class StatusReconciler {
    private readonly payment: CompiledVocabulary<AttemptStatus>;
    private readonly refund: CompiledVocabulary<RefundStatus>;
    private readonly dispute: CompiledVocabulary<DisputeStatus>;

    constructor(
        public readonly connector: string,
        vocabulary: ConnectorStatusVocabulary
    ) {
        this.payment = compileVocabulary(connector, vocabulary.payment);
        this.refund = compileVocabulary(connector, vocabulary.refund);
        this.dispute = compileVocabulary(connector, vocabulary.dispute);
    }

    reconcilePayment(raw: RawStatus, context: ReconcileContext): Reconciled<AttemptStatus> {
        const matched = this.match(PAYMENT_FAMILY, this.payment, raw, context);
        if (matched.status === 'Charged' && isPartialCapture(context)) {
            logger.info({
                connector: this.connector,
                flow: context.flow,
                raw: matched.raw,
                authorizedAmount: context.authorizedAmount,
                capturedAmount: context.capturedAmount
            }, 'Partial capture detected; reporting PartialCharged');
            return { ...matched, status: 'PartialCharged', partialCaptureOverride: true };
        }
        return matched;
    }

    reconcileRefund(raw: RawStatus, context: ReconcileContext): Reconciled<RefundStatus> {
        return this.match(REFUND_FAMILY, this.refund, raw, context);
    }

    reconcileDispute(raw: RawStatus, context: ReconcileContext): Reconciled<DisputeStatus> {
        return this.match(DISPUTE_FAMILY, this.dispute, raw, context);
    }

    /**
     * reconcile(raw, context) from the connector contract: the status family
     * follows the flow.
     */
    reconcile(raw: RawStatus, context: ReconcileContext): Reconciled<CanonicalStatus> {
        if (isRefundFlow(context.flow)) return this.reconcileRefund(raw, context);
        if (isDisputeFlow(context.flow)) return this.reconcileDispute(raw, context);
        return this.reconcilePayment(raw, context);
    }

    private match<S extends string>(
        family: Family<S>,
        vocabulary: CompiledVocabulary<S>,
        raw: RawStatus,
        context: ReconcileContext
    ): Reconciled<S> {
        const described = describeRawStatus(raw);
        const found = (mapping: StatusMapping<S>, matchedBy: MatchSource): Reconciled<S> => ({
            status: resolveMapping(mapping, context),
            matchedBy,
            raw: described,
            partialCaptureOverride: false
        });

        switch (raw.kind) {
            case 'text': {
                const token = normalizeStatusToken(raw.value);
                const own = vocabulary.text.get(token);
                if (own !== undefined) return found(own, 'connector');
                const generic = family.genericText.get(token);
                if (generic !== undefined) return found(generic, 'generic');
                break;
            }
            case 'code': {
                const own = vocabulary.codes.get(String(raw.value).trim());
                if (own !== undefined) return found(own, 'connector');
                break;
            }
            case 'flag': {
                const reason = raw.reasonCode === undefined || raw.reasonCode === null
                    ? undefined
                    : String(raw.reasonCode).trim();
                const byReason = reason === undefined ? undefined : vocabulary.flag?.reasons.get(reason);
                if (byReason !== undefined) return found(byReason, 'connector');
                if (vocabulary.flag) {
                    return found(raw.success ? vocabulary.flag.success : vocabulary.flag.failure, 'connector');
                }
                return found(raw.success ? family.flagSuccess : family.flagFailure, 'generic');
            }
        }

        logger.warn({
            connector: this.connector,
            flow: context.flow,
            family: family.name,
            raw: described
        }, 'Unmapped gateway status; defaulting to initial status');

        return {
            status: family.initial,
            matchedBy: 'default',
            raw: described,
            partialCaptureOverride: false
        };
    }
}
