/**
 * Closed set of payment-method data an outgoing request may carry.
 *
 * Each family with sub-variants is described by a variant map; the union of
 * its variants is derived from the map so a dispatcher table keyed by the
 * same map is exhaustive by construction. Everything here is read-only input.
 */

export type NoData = Readonly<Record<never, never>>;

/** One variant of a family: the map entry tagged with its key. */
export type Variant<M, K extends keyof M = keyof M> = { readonly type: K } & M[K];

/** Union of every variant of a family. */
export type VariantUnion<M> = { [K in keyof M]: Variant<M, K> }[keyof M];

export type CardNetwork = 'Visa' | 'Mastercard' | 'AmericanExpress' | 'Discover' | 'JCB' | 'DinersClub' | 'UnionPay' | 'Maestro' | 'CartesBancaires';

export interface CardDetails {
    readonly cardNumber: string;
    readonly expiryMonth: string;
    readonly expiryYear: string;
    readonly cvc: string;
    readonly holderName?: string;
    readonly network?: CardNetwork;
    readonly issuerCountry?: string;
}

export interface CardRedirectVariants {
    knet: NoData;
    benefit: NoData;
    momo_atm: NoData;
    card_redirect: NoData;
}

export interface ApplePayWalletData {
    /** Base64 encoded payment token */
    readonly paymentData: string;
    readonly paymentMethod: {
        readonly displayName: string;
        readonly network: string;
        readonly type: string;
    };
    readonly transactionIdentifier: string;
}

export interface GooglePayWalletData {
    readonly description: string;
    readonly info: {
        readonly cardNetwork: string;
        readonly cardDetails: string;
    };
    readonly tokenizationData: {
        readonly type: string;
        readonly token: string;
    };
}

export interface WalletVariants {
    apple_pay: ApplePayWalletData;
    google_pay: GooglePayWalletData;
    paypal_redirect: { readonly email?: string };
    paypal_sdk: { readonly token: string };
    samsung_pay: { readonly token: string };
    ali_pay_redirect: NoData;
    we_chat_pay_redirect: NoData;
    amazon_pay_redirect: NoData;
    mb_way: { readonly phoneNumber: string };
}

export interface PayLaterVariants {
    klarna_redirect: { readonly billingEmail?: string; readonly billingCountry?: string };
    klarna_sdk: { readonly token: string };
    affirm_redirect: NoData;
    afterpay_clearpay_redirect: { readonly billingEmail?: string; readonly billingName?: string };
    alma_redirect: NoData;
    atome_redirect: NoData;
}

export interface BankRedirectVariants {
    ideal: { readonly bankName?: string };
    sofort: { readonly country?: string; readonly preferredLanguage?: string };
    blik: { readonly blikCode: string };
    giropay: NoData;
    eps: { readonly bankName?: string };
    bancontact_card: { readonly cardNumber?: string; readonly cardHolderName?: string };
    trustly: { readonly country: string };
    przelewy24: { readonly bankName?: string };
    open_banking_uk: { readonly issuer?: string; readonly country?: string };
}

export interface BankTransferVariants {
    ach: NoData;
    sepa: NoData;
    bacs: NoData;
    multibanco: NoData;
    pix: { readonly pixKey?: string };
    pse: NoData;
}

export interface BankDebitVariants {
    ach: { readonly accountNumber: string; readonly routingNumber: string; readonly bankAccountHolderName?: string };
    sepa: { readonly iban: string; readonly bankAccountHolderName?: string };
    bacs: { readonly accountNumber: string; readonly sortCode: string; readonly bankAccountHolderName?: string };
    becs: { readonly accountNumber: string; readonly bsbNumber: string; readonly bankAccountHolderName?: string };
}

export interface VoucherVariants {
    boleto: { readonly socialSecurityNumber?: string };
    oxxo: NoData;
    efecty: NoData;
    seven_eleven: NoData;
    lawson: NoData;
}

export interface GiftCardVariants {
    givex: { readonly number: string; readonly cvc: string };
    pay_safe_card: NoData;
}

export interface CryptoData {
    readonly payCurrency?: string;
    readonly network?: string;
}

export type CardRedirectData = VariantUnion<CardRedirectVariants>;
export type WalletData = VariantUnion<WalletVariants>;
export type PayLaterData = VariantUnion<PayLaterVariants>;
export type BankRedirectData = VariantUnion<BankRedirectVariants>;
export type BankTransferData = VariantUnion<BankTransferVariants>;
export type BankDebitData = VariantUnion<BankDebitVariants>;
export type VoucherData = VariantUnion<VoucherVariants>;
export type GiftCardData = VariantUnion<GiftCardVariants>;

export type PaymentMethodData =
    | { readonly type: 'card'; readonly card: CardDetails }
    | { readonly type: 'card_redirect'; readonly cardRedirect: CardRedirectData }
    | { readonly type: 'wallet'; readonly wallet: WalletData }
    | { readonly type: 'pay_later'; readonly payLater: PayLaterData }
    | { readonly type: 'bank_redirect'; readonly bankRedirect: BankRedirectData }
    | { readonly type: 'bank_transfer'; readonly bankTransfer: BankTransferData }
    | { readonly type: 'bank_debit'; readonly bankDebit: BankDebitData }
    | { readonly type: 'voucher'; readonly voucher: VoucherData }
    | { readonly type: 'crypto'; readonly crypto: CryptoData }
    | { readonly type: 'gift_card'; readonly giftCard: GiftCardData };

export type PaymentMethodFamily = PaymentMethodData['type'];

// Complete key lists; a missing key is a compile error.
const CARD_REDIRECT_KEYS: Record<keyof CardRedirectVariants, true> = { knet: true, benefit: true, momo_atm: true, card_redirect: true };
const WALLET_KEYS: Record<keyof WalletVariants, true> = {
    apple_pay: true, google_pay: true, paypal_redirect: true, paypal_sdk: true, samsung_pay: true,
    ali_pay_redirect: true, we_chat_pay_redirect: true, amazon_pay_redirect: true, mb_way: true
};
const PAY_LATER_KEYS: Record<keyof PayLaterVariants, true> = {
    klarna_redirect: true, klarna_sdk: true, affirm_redirect: true,
    afterpay_clearpay_redirect: true, alma_redirect: true, atome_redirect: true
};
const BANK_REDIRECT_KEYS: Record<keyof BankRedirectVariants, true> = {
    ideal: true, sofort: true, blik: true, giropay: true, eps: true,
    bancontact_card: true, trustly: true, przelewy24: true, open_banking_uk: true
};
const BANK_TRANSFER_KEYS: Record<keyof BankTransferVariants, true> = { ach: true, sepa: true, bacs: true, multibanco: true, pix: true, pse: true };
const BANK_DEBIT_KEYS: Record<keyof BankDebitVariants, true> = { ach: true, sepa: true, bacs: true, becs: true };
const VOUCHER_KEYS: Record<keyof VoucherVariants, true> = { boleto: true, oxxo: true, efecty: true, seven_eleven: true, lawson: true };
const GIFT_CARD_KEYS: Record<keyof GiftCardVariants, true> = { givex: true, pay_safe_card: true };

/**
 * Every family and its variant keys. Families without variants list none.
 */
export const PAYMENT_METHOD_VARIANTS: Readonly<Record<PaymentMethodFamily, readonly string[]>> = {
    card: [],
    card_redirect: Object.keys(CARD_REDIRECT_KEYS),
    wallet: Object.keys(WALLET_KEYS),
    pay_later: Object.keys(PAY_LATER_KEYS),
    bank_redirect: Object.keys(BANK_REDIRECT_KEYS),
    bank_transfer: Object.keys(BANK_TRANSFER_KEYS),
    bank_debit: Object.keys(BANK_DEBIT_KEYS),
    voucher: Object.keys(VOUCHER_KEYS),
    crypto: [],
    gift_card: Object.keys(GIFT_CARD_KEYS)
};

/**
 * Human-readable name of the payment method, e.g. "card", "wallet.apple_pay".
 */
export function paymentMethodLabel(data: PaymentMethodData): string {
    switch (data.type) {
        case 'card':
        case 'crypto':
            return data.type;
        case 'card_redirect':
            return `${data.type}.${data.cardRedirect.type}`;
        case 'wallet':
            return `${data.type}.${data.wallet.type}`;
        case 'pay_later':
            return `${data.type}.${data.payLater.type}`;
        case 'bank_redirect':
            return `${data.type}.${data.bankRedirect.type}`;
        case 'bank_transfer':
            return `${data.type}.${data.bankTransfer.type}`;
        case 'bank_debit':
            return `${data.type}.${data.bankDebit.type}`;
        case 'voucher':
            return `${data.type}.${data.voucher.type}`;
        case 'gift_card':
            return `${data.type}.${data.giftCard.type}`;
    }
}
