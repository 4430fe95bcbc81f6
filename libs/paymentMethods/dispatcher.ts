/**
 * Payment-method dispatch.
 *
 * A connector declares one handler per family (or per variant of a family)
 * in a PaymentMethodHandlers table. Every key of the table is required, so a
 * connector that forgets a payment method does not compile; a method the
 * gateway does not offer is routed to `notSupported` explicitly.
 *
 * Handlers are pure: they read the payment-method data and return the
 * fragment to merge into the outgoing request. They know nothing of HTTP.
 */

import { logger } from '../logging/logger.js';
import { MissingRequiredFieldError, NotSupportedError } from '../errors/connectorErrors.js';
import type { MinorUnit } from '../amount/amountConverter.js';
import type { Currency } from '../amount/currency.js';
import type { FlowKind } from '../flows/flowKinds.js';
import { err, ok, type Result } from '../flows/result.js';
import type { CaptureMethod } from '../status/statusReconciler.js';
import {
    paymentMethodLabel,
    type BankDebitVariants,
    type BankRedirectVariants,
    type BankTransferVariants,
    type CardDetails,
    type CardRedirectVariants,
    type CryptoData,
    type GiftCardVariants,
    type PayLaterVariants,
    type PaymentMethodData,
    type Variant,
    type VoucherVariants,
    type WalletVariants
} from './paymentMethodData.js';

export interface FlowContext {
    readonly connector: string;
    readonly flow: FlowKind;
    readonly amount: MinorUnit;
    readonly currency: Currency;
    readonly captureMethod?: CaptureMethod;
}

export interface DispatchContext extends FlowContext {
    /** Label of the payment method being dispatched, e.g. "wallet.apple_pay" */
    readonly paymentMethod: string;
}

export type DispatchError = NotSupportedError | MissingRequiredFieldError;

export type DispatchResult<F> = Result<F, DispatchError>;

export type VariantHandler<D, F> = (data: D, context: DispatchContext) => DispatchResult<F>;

export type VariantHandlers<M, F> = { readonly [K in keyof M]: VariantHandler<Variant<M, K>, F> };

/** Either one handler per variant, or one handler for the whole family. */
export type FamilyHandler<M, F> = VariantHandlers<M, F> | VariantHandler<Variant<M>, F>;

export interface PaymentMethodHandlers<F> {
    readonly card: VariantHandler<CardDetails, F>;
    readonly cardRedirect: FamilyHandler<CardRedirectVariants, F>;
    readonly wallet: FamilyHandler<WalletVariants, F>;
    readonly payLater: FamilyHandler<PayLaterVariants, F>;
    readonly bankRedirect: FamilyHandler<BankRedirectVariants, F>;
    readonly bankTransfer: FamilyHandler<BankTransferVariants, F>;
    readonly bankDebit: FamilyHandler<BankDebitVariants, F>;
    readonly voucher: FamilyHandler<VoucherVariants, F>;
    readonly crypto: VariantHandler<CryptoData, F>;
    readonly giftCard: FamilyHandler<GiftCardVariants, F>;
}

/**
 * Explicit "this gateway does not offer this payment method" branch.
 */
export const notSupported: VariantHandler<unknown, never> = (_data, context) =>
    err(new NotSupportedError(`Payment method ${context.paymentMethod}`, context.connector));

export function supported<F>(fragment: F): DispatchResult<F> {
    return ok(fragment);
}

/**
 * Branch helper for a required value inside payment-method data.
 */
export function missingField(fieldName: string, context: DispatchContext): DispatchResult<never> {
    return err(new MissingRequiredFieldError(fieldName, context.connector));
}

function runFamily<M, K extends keyof M, F>(
    handler: FamilyHandler<M, F>,
    variant: Variant<M, K>,
    context: DispatchContext
): DispatchResult<F> {
    if (typeof handler === 'function') {
        return handler(variant, context);
    }
    const variantHandler = handler[variant.type];
    return variantHandler(variant, context);
}

function assertNever(value: never): never {
    throw new Error(`Unhandled payment method: ${JSON.stringify(value)}`);
}

export class PaymentMethodDispatcher<F> {
    constructor(
        public readonly connector: string,
        private readonly handlers: PaymentMethodHandlers<F>
    ) {}

    /**
     * dispatch(data, context) from the connector contract. Never mutates data.
     */
    dispatch(data: PaymentMethodData, flowContext: FlowContext): DispatchResult<F> {
        const context: DispatchContext = { ...flowContext, paymentMethod: paymentMethodLabel(data) };
        const result = this.route(data, context);

        if (!result.ok) {
            logger.info({
                connector: this.connector,
                flow: context.flow,
                paymentMethod: context.paymentMethod,
                code: result.error.code
            }, 'Payment method dispatch refused');
        }
        return result;
    }

    /**
     * Dispatch variant that throws the DispatchError, for use inside body builders.
     */
    dispatchOrThrow(data: PaymentMethodData, flowContext: FlowContext): F {
        const result = this.dispatch(data, flowContext);
        if (!result.ok) {
            throw result.error;
        }
        return result.value;
    }

    private route(data: PaymentMethodData, context: DispatchContext): DispatchResult<F> {
        const { handlers } = this;
        switch (data.type) {
            case 'card':
                return handlers.card(data.card, context);
            case 'card_redirect':
                return runFamily<CardRedirectVariants, keyof CardRedirectVariants, F>(handlers.cardRedirect, data.cardRedirect, context);
            case 'wallet':
                return runFamily<WalletVariants, keyof WalletVariants, F>(handlers.wallet, data.wallet, context);
            case 'pay_later':
                return runFamily<PayLaterVariants, keyof PayLaterVariants, F>(handlers.payLater, data.payLater, context);
            case 'bank_redirect':
                return runFamily<BankRedirectVariants, keyof BankRedirectVariants, F>(handlers.bankRedirect, data.bankRedirect, context);
            case 'bank_transfer':
                return runFamily<BankTransferVariants, keyof BankTransferVariants, F>(handlers.bankTransfer, data.bankTransfer, context);
            case 'bank_debit':
                return runFamily<BankDebitVariants, keyof BankDebitVariants, F>(handlers.bankDebit, data.bankDebit, context);
            case 'voucher':
                return runFamily<VoucherVariants, keyof VoucherVariants, F>(handlers.voucher, data.voucher, context);
            case 'crypto':
                return handlers.crypto(data.crypto, context);
            case 'gift_card':
                return runFamily<GiftCardVariants, keyof GiftCardVariants, F>(handlers.giftCard, data.giftCard, context);
            default:
                return assertNever(data);
        }
    }
}
