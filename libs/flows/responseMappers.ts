/**
 * Turns a flow outcome into the canonical response for that flow.
 *
 * Status words go through the StatusReconciler with the amounts the flow
 * knows about, so a partial settlement is reported as PartialCharged on every
 * flow that can observe one.
 */

import type { MinorUnit } from '../amount/amountConverter.js';
import type { ErrorResponse } from '../errors/errorKinds.js';
import {
    isTerminalAttemptStatus,
    isTerminalRefundStatus,
    type AttemptStatus
} from '../status/statuses.js';
import { describeRawStatus, type ReconcileContext, type StatusReconciler } from '../status/statusReconciler.js';
import type { RequestEnvelope } from './envelope.js';
import type {
    DisputeResponseData,
    FlowResponse,
    PaymentsResponseData,
    RefundsResponseData
} from './flowData.js';
import type { DisputeOutcome, FlowOutcome, PaymentOutcome, RefundOutcome } from './flowDefinition.js';
import type { RequestFlow } from './flowKinds.js';

export interface MappedResponse<F extends RequestFlow> {
    readonly response: FlowResponse<F>;
    /** Attempt status the response proposes; absent for refund and dispute flows */
    readonly status?: AttemptStatus;
}

export interface ResponseMapper<F extends RequestFlow> {
    fromOutcome(envelope: RequestEnvelope<F>, outcome: FlowOutcome<F>, reconciler: StatusReconciler): MappedResponse<F>;
    /** Success implied by an AlreadyProcessed error, when the error names enough */
    fromAlreadyProcessed(envelope: RequestEnvelope<F>, error: ErrorResponse): MappedResponse<F> | undefined;
}

function paymentResponse(
    outcome: PaymentOutcome,
    reconciler: StatusReconciler,
    context: ReconcileContext,
    fallbackTransactionId?: string
): { response: PaymentsResponseData; status: AttemptStatus } {
    const { status } = reconciler.reconcilePayment(outcome.rawStatus, context);
    const settled = status === 'Charged' || status === 'PartialCharged';

    return {
        status,
        response: {
            status,
            connectorTransactionId: outcome.connectorTransactionId ?? fallbackTransactionId,
            connectorResponseReferenceId: outcome.connectorResponseReferenceId,
            amountCaptured: settled ? context.capturedAmount ?? context.authorizedAmount : undefined,
            redirection: outcome.redirection,
            mandateReference: outcome.mandateReference,
            networkTransactionId: outcome.networkTransactionId,
            idempotentReplay: false
        }
    };
}

function paymentReplay(
    error: ErrorResponse,
    fallbackTransactionId?: string,
    capturedAmount?: MinorUnit
): { response: PaymentsResponseData; status: AttemptStatus } | undefined {
    const status = error.attemptStatus;
    if (status === undefined || !isTerminalAttemptStatus(status)) return undefined;

    const settled = status === 'Charged' || status === 'PartialCharged';
    return {
        status,
        response: {
            status,
            connectorTransactionId: error.connectorTransactionId ?? fallbackTransactionId,
            amountCaptured: settled ? capturedAmount : undefined,
            idempotentReplay: true
        }
    };
}

function refundResponse(outcome: RefundOutcome, reconciler: StatusReconciler, context: ReconcileContext): { response: RefundsResponseData } {
    return {
        response: {
            refundStatus: reconciler.reconcileRefund(outcome.rawStatus, context).status,
            connectorRefundId: outcome.connectorRefundId,
            idempotentReplay: false
        }
    };
}

/** The refund id comes from the error or the request, never from the payment id. */
function refundReplay(error: ErrorResponse, knownRefundId?: string): { response: RefundsResponseData } | undefined {
    const status = error.refundStatus;
    const connectorRefundId = error.connectorRefundId ?? knownRefundId;
    if (status === undefined || !isTerminalRefundStatus(status) || connectorRefundId === undefined) return undefined;

    return { response: { refundStatus: status, connectorRefundId, idempotentReplay: true } };
}

function disputeResponse(outcome: DisputeOutcome, reconciler: StatusReconciler, context: ReconcileContext): { response: DisputeResponseData } {
    return {
        response: {
            disputeStatus: reconciler.reconcileDispute(outcome.rawStatus, context).status,
            connectorDisputeId: outcome.connectorDisputeId,
            connectorStatus: describeRawStatus(outcome.rawStatus)
        }
    };
}

const noReplay = (): undefined => undefined;

export const RESPONSE_MAPPERS: { readonly [F in RequestFlow]: ResponseMapper<F> } = {
    Authorize: {
        fromOutcome: (envelope, outcome, reconciler) => paymentResponse(outcome, reconciler, {
            flow: 'Authorize',
            captureMethod: envelope.request.captureMethod,
            authorizedAmount: envelope.request.amount,
            capturedAmount: outcome.capturedAmount
        }),
        fromAlreadyProcessed: (envelope, error) => paymentReplay(error, undefined, envelope.request.amount)
    },
    Capture: {
        fromOutcome: (envelope, outcome, reconciler) => paymentResponse(outcome, reconciler, {
            flow: 'Capture',
            authorizedAmount: envelope.request.paymentAmount,
            capturedAmount: outcome.capturedAmount ?? envelope.request.amountToCapture
        }, envelope.request.connectorTransactionId),
        fromAlreadyProcessed: (envelope, error) =>
            paymentReplay(error, envelope.request.connectorTransactionId, envelope.request.amountToCapture)
    },
    Void: {
        fromOutcome: (envelope, outcome, reconciler) => paymentResponse(outcome, reconciler, {
            flow: 'Void'
        }, envelope.request.connectorTransactionId),
        fromAlreadyProcessed: (envelope, error) => paymentReplay(error, envelope.request.connectorTransactionId)
    },
    PSync: {
        fromOutcome: (envelope, outcome, reconciler) => paymentResponse(outcome, reconciler, {
            flow: 'PSync',
            captureMethod: envelope.request.captureMethod,
            authorizedAmount: envelope.request.amount,
            capturedAmount: outcome.capturedAmount ?? envelope.commonData.amountCaptured
        }, envelope.request.connectorTransactionId),
        fromAlreadyProcessed: noReplay
    },
    SetupMandate: {
        fromOutcome: (_envelope, outcome, reconciler) => paymentResponse(outcome, reconciler, { flow: 'SetupMandate' }),
        fromAlreadyProcessed: noReplay
    },
    Refund: {
        fromOutcome: (_envelope, outcome, reconciler) => refundResponse(outcome, reconciler, { flow: 'Refund' }),
        fromAlreadyProcessed: (_envelope, error) => refundReplay(error)
    },
    RSync: {
        fromOutcome: (_envelope, outcome, reconciler) => refundResponse(outcome, reconciler, { flow: 'RSync' }),
        fromAlreadyProcessed: (envelope, error) => refundReplay(error, envelope.request.connectorRefundId)
    },
    CreateOrder: {
        fromOutcome: (_envelope, outcome, reconciler) => {
            const status = outcome.rawStatus
                ? reconciler.reconcilePayment(outcome.rawStatus, { flow: 'CreateOrder' }).status
                : 'Pending';
            return { status, response: { orderId: outcome.orderId, status } };
        },
        fromAlreadyProcessed: noReplay
    },
    DefendDispute: {
        fromOutcome: (_envelope, outcome, reconciler) => disputeResponse(outcome, reconciler, { flow: 'DefendDispute' }),
        fromAlreadyProcessed: noReplay
    },
    AcceptDispute: {
        fromOutcome: (_envelope, outcome, reconciler) => disputeResponse(outcome, reconciler, { flow: 'AcceptDispute' }),
        fromAlreadyProcessed: noReplay
    },
    SubmitEvidence: {
        fromOutcome: (_envelope, outcome, reconciler) => disputeResponse(outcome, reconciler, { flow: 'SubmitEvidence' }),
        fromAlreadyProcessed: noReplay
    }
};
