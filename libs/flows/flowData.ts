/**
 * Request and response data per flow.
 *
 * Every field a flow needs to run travels here explicitly (transaction id,
 * amounts, currency), so no flow depends on another having run first in the
 * same process.
 */

import type { MinorUnit } from '../amount/amountConverter.js';
import type { Currency } from '../amount/currency.js';
import type { PaymentMethodData } from '../paymentMethods/paymentMethodData.js';
import type { AttemptStatus, DisputeStatus, RefundStatus } from '../status/statuses.js';
import type { CaptureMethod } from '../status/statusReconciler.js';
import type { RequestFlow } from './flowKinds.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface BrowserInfo {
    readonly userAgent?: string;
    readonly acceptHeader?: string;
    readonly language?: string;
    readonly ipAddress?: string;
    readonly colorDepth?: number;
    readonly screenHeight?: number;
    readonly screenWidth?: number;
    readonly timeZoneOffsetMinutes?: number;
    readonly javaEnabled?: boolean;
}

export interface AuthorizeData {
    readonly amount: MinorUnit;
    readonly currency: Currency;
    readonly paymentMethodData: PaymentMethodData;
    readonly captureMethod: CaptureMethod;
    readonly email?: string;
    readonly returnUrl?: string;
    readonly webhookUrl?: string;
    readonly description?: string;
    readonly statementDescriptor?: string;
    readonly browserInfo?: BrowserInfo;
    readonly setupFutureUsage?: 'on_session' | 'off_session';
    /** Gateway order created by a preceding CreateOrder call, when the gateway needs one */
    readonly connectorOrderId?: string;
    readonly metadata?: Readonly<Record<string, string>>;
}

export interface CaptureData {
    readonly amountToCapture: MinorUnit;
    /** Amount originally authorised */
    readonly paymentAmount: MinorUnit;
    readonly currency: Currency;
    readonly connectorTransactionId: string;
    readonly multipleCaptureReference?: string;
}

export interface VoidData {
    readonly connectorTransactionId: string;
    readonly currency?: Currency;
    readonly amount?: MinorUnit;
    readonly cancellationReason?: string;
}

export interface PaymentSyncData {
    /** Absent when the attempt never received a gateway id; sync then uses the request reference id */
    readonly connectorTransactionId?: string;
    readonly amount: MinorUnit;
    readonly currency: Currency;
    readonly captureMethod?: CaptureMethod;
}

export interface RefundData {
    readonly refundId: string;
    readonly connectorTransactionId: string;
    readonly refundAmount: MinorUnit;
    readonly paymentAmount: MinorUnit;
    readonly currency: Currency;
    readonly reason?: string;
}

export interface RefundSyncData {
    readonly refundId: string;
    readonly connectorTransactionId: string;
    readonly connectorRefundId?: string;
    readonly refundAmount: MinorUnit;
    readonly currency: Currency;
}

export interface CreateOrderData {
    readonly amount: MinorUnit;
    readonly currency: Currency;
    readonly receipt?: string;
    readonly metadata?: Readonly<Record<string, string>>;
}

export interface CustomerAcceptance {
    readonly acceptedAt: string;
    readonly onlineIpAddress?: string;
    readonly onlineUserAgent?: string;
}

export interface SetupMandateData {
    readonly paymentMethodData: PaymentMethodData;
    readonly currency: Currency;
    /** Verification amount; zero when the gateway supports zero-value authorisation */
    readonly amount: MinorUnit;
    readonly customerAcceptance?: CustomerAcceptance;
    readonly returnUrl?: string;
}

export interface DefendDisputeData {
    readonly connectorDisputeId: string;
    readonly connectorTransactionId?: string;
    readonly defenseReasonCode: string;
}

export interface AcceptDisputeData {
    readonly connectorDisputeId: string;
    readonly connectorTransactionId?: string;
}

export interface DisputeEvidence {
    readonly uncategorizedText?: string;
    readonly receiptFileId?: string;
    readonly shippingTrackingNumber?: string;
    readonly customerCommunicationFileId?: string;
    readonly refundPolicyDisclosure?: string;
}

export interface SubmitEvidenceData {
    readonly connectorDisputeId: string;
    readonly evidence: DisputeEvidence;
}

export interface RedirectForm {
    readonly endpoint: string;
    readonly method: HttpMethod;
    readonly formFields: Readonly<Record<string, string>>;
}

export interface MandateReference {
    readonly connectorMandateId: string;
    readonly paymentMethodId?: string;
}

export interface PaymentsResponseData {
    readonly status: AttemptStatus;
    readonly connectorTransactionId?: string;
    readonly connectorResponseReferenceId?: string;
    readonly amountCaptured?: MinorUnit;
    readonly redirection?: RedirectForm;
    readonly mandateReference?: MandateReference;
    readonly networkTransactionId?: string;
    /** True when the gateway reported the operation as already applied */
    readonly idempotentReplay: boolean;
}

export interface RefundsResponseData {
    readonly refundStatus: RefundStatus;
    readonly connectorRefundId: string;
    readonly idempotentReplay: boolean;
}

export interface OrderResponseData {
    readonly orderId: string;
    readonly status: AttemptStatus;
}

export interface DisputeResponseData {
    readonly disputeStatus: DisputeStatus;
    readonly connectorDisputeId: string;
    /** Gateway's own status word, kept for display */
    readonly connectorStatus: string;
}

export interface FlowDataMap {
    Authorize: { request: AuthorizeData; response: PaymentsResponseData };
    Capture: { request: CaptureData; response: PaymentsResponseData };
    Void: { request: VoidData; response: PaymentsResponseData };
    PSync: { request: PaymentSyncData; response: PaymentsResponseData };
    SetupMandate: { request: SetupMandateData; response: PaymentsResponseData };
    Refund: { request: RefundData; response: RefundsResponseData };
    RSync: { request: RefundSyncData; response: RefundsResponseData };
    CreateOrder: { request: CreateOrderData; response: OrderResponseData };
    DefendDispute: { request: DefendDisputeData; response: DisputeResponseData };
    AcceptDispute: { request: AcceptDisputeData; response: DisputeResponseData };
    SubmitEvidence: { request: SubmitEvidenceData; response: DisputeResponseData };
}

export type FlowRequest<F extends RequestFlow> = FlowDataMap[F]['request'];
export type FlowResponse<F extends RequestFlow> = FlowDataMap[F]['response'];
