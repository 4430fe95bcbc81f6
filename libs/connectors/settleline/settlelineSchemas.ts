import { z } from 'zod';

export const SettlelineErrorSchema = z.object({
    error_code: z.union([z.number().int(), z.string()]),
    error_message: z.string().optional(),
    transaction_id: z.string().optional(),
    scheme_response_code: z.string().optional()
});

export const SettlelineTransactionSchema = z.object({
    transaction_id: z.string().min(1),
    approved: z.boolean(),
    result_code: z.number().int().nullable().optional(),
    redirect_url: z.string().url().optional()
});

export const SettlelineTransactionStateSchema = z.object({
    transaction_id: z.string().min(1),
    state: z.string(),
    amount: z.string(),
    settled_amount: z.string().optional()
});

/** Void replies with a bare JSON boolean. */
export const SettlelineVoidSchema = z.boolean();

export const SettlelineRefundSchema = z.object({
    refund_id: z.string().min(1),
    code: z.number().int()
});

export const SettlelineWebhookSchema = z.object({
    event: z.string(),
    transaction_id: z.string().min(1),
    refund_id: z.string().optional(),
    merchant_reference: z.string().optional(),
    currency: z.string().length(3).optional(),
    amount: z.string().optional(),
    settled_amount: z.string().optional()
});

export type SettlelineError = z.infer<typeof SettlelineErrorSchema>;
export type SettlelineTransaction = z.infer<typeof SettlelineTransactionSchema>;
export type SettlelineWebhook = z.infer<typeof SettlelineWebhookSchema>;

/** Form fields describing the payment method. */
export type SettlelinePaymentFields = Readonly<Record<string, string>>;
