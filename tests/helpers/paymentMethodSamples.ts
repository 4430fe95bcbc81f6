import type {
    BankDebitVariants,
    BankRedirectVariants,
    BankTransferVariants,
    CardRedirectVariants,
    GiftCardVariants,
    PayLaterVariants,
    PaymentMethodData,
    Variant,
    VoucherVariants,
    WalletVariants
} from '../../libs/paymentMethods/paymentMethodData.js';
import { TEST_CARD } from './fixtures.js';

/** One sample per variant; a variant added to a family must get a sample here. */
type Samples<M> = { readonly [K in keyof M]: Variant<M, K> };

const CARD_REDIRECTS: Samples<CardRedirectVariants> = {
    knet: { type: 'knet' },
    benefit: { type: 'benefit' },
    momo_atm: { type: 'momo_atm' },
    card_redirect: { type: 'card_redirect' }
};

const WALLETS: Samples<WalletVariants> = {
    apple_pay: {
        type: 'apple_pay',
        paymentData: 'dGVzdC10b2tlbg==',
        paymentMethod: { displayName: 'Visa 0000', network: 'Visa', type: 'debit' },
        transactionIdentifier: 'apple-txn-1'
    },
    google_pay: {
        type: 'google_pay',
        description: 'Visa 0000',
        info: { cardNetwork: 'VISA', cardDetails: '0000' },
        tokenizationData: { type: 'PAYMENT_GATEWAY', token: 'test-token' }
    },
    paypal_redirect: { type: 'paypal_redirect', email: 'buyer@example.com' },
    paypal_sdk: { type: 'paypal_sdk', token: 'test-token' },
    samsung_pay: { type: 'samsung_pay', token: 'test-token' },
    ali_pay_redirect: { type: 'ali_pay_redirect' },
    we_chat_pay_redirect: { type: 'we_chat_pay_redirect' },
    amazon_pay_redirect: { type: 'amazon_pay_redirect' },
    mb_way: { type: 'mb_way', phoneNumber: '+351900000000' }
};

const PAY_LATER: Samples<PayLaterVariants> = {
    klarna_redirect: { type: 'klarna_redirect', billingEmail: 'buyer@example.com', billingCountry: 'SE' },
    klarna_sdk: { type: 'klarna_sdk', token: 'test-token' },
    affirm_redirect: { type: 'affirm_redirect' },
    afterpay_clearpay_redirect: { type: 'afterpay_clearpay_redirect', billingEmail: 'buyer@example.com' },
    alma_redirect: { type: 'alma_redirect' },
    atome_redirect: { type: 'atome_redirect' }
};

const BANK_REDIRECTS: Samples<BankRedirectVariants> = {
    ideal: { type: 'ideal', bankName: 'test_bank' },
    sofort: { type: 'sofort', country: 'DE', preferredLanguage: 'de' },
    blik: { type: 'blik', blikCode: '777123' },
    giropay: { type: 'giropay' },
    eps: { type: 'eps', bankName: 'test_bank' },
    bancontact_card: { type: 'bancontact_card', cardHolderName: 'Test Holder' },
    trustly: { type: 'trustly', country: 'FI' },
    przelewy24: { type: 'przelewy24' },
    open_banking_uk: { type: 'open_banking_uk', country: 'GB' }
};

const BANK_TRANSFERS: Samples<BankTransferVariants> = {
    ach: { type: 'ach' },
    sepa: { type: 'sepa' },
    bacs: { type: 'bacs' },
    multibanco: { type: 'multibanco' },
    pix: { type: 'pix', pixKey: 'test-pix-key' },
    pse: { type: 'pse' }
};

const BANK_DEBITS: Samples<BankDebitVariants> = {
    ach: { type: 'ach', accountNumber: '000123456789', routingNumber: '110000000' },
    sepa: { type: 'sepa', iban: 'DE00TEST0000000000' },
    bacs: { type: 'bacs', accountNumber: '00012345', sortCode: '000000' },
    becs: { type: 'becs', accountNumber: '000123456', bsbNumber: '000000' }
};

const VOUCHERS: Samples<VoucherVariants> = {
    boleto: { type: 'boleto', socialSecurityNumber: '00000000000' },
    oxxo: { type: 'oxxo' },
    efecty: { type: 'efecty' },
    seven_eleven: { type: 'seven_eleven' },
    lawson: { type: 'lawson' }
};

const GIFT_CARDS: Samples<GiftCardVariants> = {
    givex: { type: 'givex', number: '6036280000000000000', cvc: '123' },
    pay_safe_card: { type: 'pay_safe_card' }
};

export const PAYMENT_METHOD_SAMPLES: readonly PaymentMethodData[] = [
    { type: 'card', card: TEST_CARD },
    { type: 'crypto', crypto: { payCurrency: 'BTC' } },
    ...Object.values(CARD_REDIRECTS).map((cardRedirect): PaymentMethodData => ({ type: 'card_redirect', cardRedirect })),
    ...Object.values(WALLETS).map((wallet): PaymentMethodData => ({ type: 'wallet', wallet })),
    ...Object.values(PAY_LATER).map((payLater): PaymentMethodData => ({ type: 'pay_later', payLater })),
    ...Object.values(BANK_REDIRECTS).map((bankRedirect): PaymentMethodData => ({ type: 'bank_redirect', bankRedirect })),
    ...Object.values(BANK_TRANSFERS).map((bankTransfer): PaymentMethodData => ({ type: 'bank_transfer', bankTransfer })),
    ...Object.values(BANK_DEBITS).map((bankDebit): PaymentMethodData => ({ type: 'bank_debit', bankDebit })),
    ...Object.values(VOUCHERS).map((voucher): PaymentMethodData => ({ type: 'voucher', voucher })),
    ...Object.values(GIFT_CARDS).map((giftCard): PaymentMethodData => ({ type: 'gift_card', giftCard }))
];
