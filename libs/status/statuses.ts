/**
 * Canonical status vocabularies.
 *
 * Every gateway status, whatever its shape, is reconciled into one of these
 * closed sets. Attempt statuses are ordered by finality, not by declaration
 * order: a status may only be replaced by one of equal or higher rank, and a
 * terminal status is never replaced at all.
 */

export const ATTEMPT_STATUSES = [
    'Pending',
    'AuthenticationPending',
    'Authorized',
    'CaptureInitiated',
    'VoidInitiated',
    'Charged',
    'PartialCharged',
    'Failure',
    'Voided',
    'AuthorizationFailed',
    'VoidFailed'
] as const;

export type AttemptStatus = typeof ATTEMPT_STATUSES[number];

export const REFUND_STATUSES = ['Pending', 'ManualReview', 'Success', 'Failure'] as const;

export type RefundStatus = typeof REFUND_STATUSES[number];

export const DISPUTE_STATUSES = [
    'Opened',
    'Challenged',
    'Expired',
    'Accepted',
    'Cancelled',
    'Won',
    'Lost'
] as const;

export type DisputeStatus = typeof DISPUTE_STATUSES[number];

/**
 * Finality rank per attempt status.
 * 0 = not started, 1 = awaiting customer/issuer, 2 = settlement or
 * cancellation requested, 3 = terminal.
 */
export const ATTEMPT_STATUS_RANK: Record<AttemptStatus, 0 | 1 | 2 | 3> = {
    Pending: 0,
    AuthenticationPending: 1,
    Authorized: 1,
    CaptureInitiated: 2,
    VoidInitiated: 2,
    Charged: 3,
    PartialCharged: 3,
    Failure: 3,
    Voided: 3,
    AuthorizationFailed: 3,
    VoidFailed: 3
};

export const REFUND_STATUS_RANK: Record<RefundStatus, 0 | 1 | 3> = {
    Pending: 0,
    ManualReview: 1,
    Success: 3,
    Failure: 3
};

export const DISPUTE_STATUS_RANK: Record<DisputeStatus, 0 | 1 | 3> = {
    Opened: 0,
    Challenged: 1,
    Expired: 3,
    Accepted: 3,
    Cancelled: 3,
    Won: 3,
    Lost: 3
};

export function isTerminalAttemptStatus(status: AttemptStatus): boolean {
    return ATTEMPT_STATUS_RANK[status] === 3;
}

export function isTerminalRefundStatus(status: RefundStatus): boolean {
    return REFUND_STATUS_RANK[status] === 3;
}

export function isTerminalDisputeStatus(status: DisputeStatus): boolean {
    return DISPUTE_STATUS_RANK[status] === 3;
}

export function isAttemptStatus(value: string): value is AttemptStatus {
    return ATTEMPT_STATUSES.some(status => status === value);
}

export function isRefundStatus(value: string): value is RefundStatus {
    return REFUND_STATUSES.some(status => status === value);
}

export function isDisputeStatus(value: string): value is DisputeStatus {
    return DISPUTE_STATUSES.some(status => status === value);
}

export interface StatusTransition<S extends string> {
    /** Status the record holds after the transition was evaluated */
    readonly status: S;
    /** False when the proposed status was refused as a regression */
    readonly applied: boolean;
}

function advance<S extends string>(
    rank: Record<S, number>,
    current: S,
    proposed: S
): StatusTransition<S> {
    if (current === proposed) {
        return { status: current, applied: true };
    }
    if (rank[current] === 3 || rank[proposed] < rank[current]) {
        return { status: current, applied: false };
    }
    return { status: proposed, applied: true };
}

/**
 * Moves an attempt status forward through the finality lattice.
 * Regressions and exits from a terminal status are refused and the current
 * status is kept.
 */
export function advanceAttemptStatus(current: AttemptStatus, proposed: AttemptStatus): StatusTransition<AttemptStatus> {
    return advance(ATTEMPT_STATUS_RANK, current, proposed);
}

export function advanceRefundStatus(current: RefundStatus, proposed: RefundStatus): StatusTransition<RefundStatus> {
    return advance(REFUND_STATUS_RANK, current, proposed);
}

export function advanceDisputeStatus(current: DisputeStatus, proposed: DisputeStatus): StatusTransition<DisputeStatus> {
    return advance(DISPUTE_STATUS_RANK, current, proposed);
}
