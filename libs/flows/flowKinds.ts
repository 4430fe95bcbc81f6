/**
 * Flow markers. One marker tags every envelope; the marker decides which
 * request and response data the envelope carries.
 */

export const REQUEST_FLOWS = [
    'Authorize',
    'Capture',
    'Void',
    'Refund',
    'PSync',
    'RSync',
    'CreateOrder',
    'SetupMandate',
    'DefendDispute',
    'AcceptDispute',
    'SubmitEvidence'
] as const;

export type RequestFlow = typeof REQUEST_FLOWS[number];

/** Webhook is a flow for reconciliation purposes only: it is never dispatched. */
export type FlowKind = RequestFlow | 'Webhook';

export const REFUND_FLOWS = ['Refund', 'RSync'] as const satisfies readonly RequestFlow[];
export const DISPUTE_FLOWS = ['DefendDispute', 'AcceptDispute', 'SubmitEvidence'] as const satisfies readonly RequestFlow[];

export type RefundFlow = typeof REFUND_FLOWS[number];
export type DisputeFlow = typeof DISPUTE_FLOWS[number];
export type PaymentFlow = Exclude<RequestFlow, RefundFlow | DisputeFlow | 'CreateOrder'>;

export function isRefundFlow(flow: FlowKind): flow is RefundFlow {
    return flow === 'Refund' || flow === 'RSync';
}

export function isDisputeFlow(flow: FlowKind): flow is DisputeFlow {
    return flow === 'DefendDispute' || flow === 'AcceptDispute' || flow === 'SubmitEvidence';
}

export function isRequestFlow(value: string): value is RequestFlow {
    return REQUEST_FLOWS.some(flow => flow === value);
}
