import { z } from 'zod';

export const NovapayErrorSchema = z.object({
    code: z.string(),
    message: z.string().optional(),
    decline_code: z.string().optional(),
    advice_code: z.string().optional(),
    network_message: z.string().optional(),
    payment_id: z.string().optional(),
    refund_id: z.string().optional()
});

export const NovapayErrorBodySchema = z.object({
    error: NovapayErrorSchema
});

export const NovapayPaymentSchema = z.object({
    id: z.string().min(1),
    status: z.string(),
    amount: z.number().int().nonnegative(),
    amount_captured: z.number().int().nonnegative().optional(),
    reference: z.string().optional(),
    next_action: z.object({
        redirect_url: z.string().url(),
        method: z.enum(['GET', 'POST']).default('GET'),
        params: z.record(z.string()).default({})
    }).optional(),
    network_transaction_id: z.string().optional(),
    mandate_id: z.string().optional(),
    /** Present when the payment was refused; the HTTP status is still 200 */
    error: NovapayErrorSchema.optional()
});

export const NovapayRefundSchema = z.object({
    id: z.string().min(1),
    status: z.string(),
    amount: z.number().int().nonnegative(),
    payment_id: z.string()
});

export const NovapayOrderSchema = z.object({
    id: z.string().min(1),
    status: z.string()
});

export const NovapayDisputeSchema = z.object({
    id: z.string().min(1),
    status: z.string()
});

export const NovapayWebhookSchema = z.object({
    id: z.string(),
    type: z.string(),
    data: z.object({
        object: z.enum(['payment', 'refund', 'dispute']),
        id: z.string().min(1),
        status: z.string(),
        payment_id: z.string().optional(),
        amount: z.number().int().nonnegative().optional(),
        amount_captured: z.number().int().nonnegative().optional()
    })
});

export type NovapayError = z.infer<typeof NovapayErrorSchema>;
export type NovapayErrorBody = z.infer<typeof NovapayErrorBodySchema>;
export type NovapayPayment = z.infer<typeof NovapayPaymentSchema>;
export type NovapayRefund = z.infer<typeof NovapayRefundSchema>;
export type NovapayOrder = z.infer<typeof NovapayOrderSchema>;
export type NovapayDispute = z.infer<typeof NovapayDisputeSchema>;
export type NovapayWebhook = z.infer<typeof NovapayWebhookSchema>;

/** Payment-method object of the payments and mandates endpoints. */
export type NovapayPaymentMethod =
    | {
        readonly type: 'card';
        readonly card: {
            readonly number: string;
            readonly exp_month: string;
            readonly exp_year: string;
            readonly cvc: string;
            readonly holder_name?: string;
        };
    }
    | { readonly type: 'apple_pay'; readonly apple_pay: { readonly payment_data: string; readonly network: string; readonly transaction_id: string } }
    | { readonly type: 'google_pay'; readonly google_pay: { readonly token: string; readonly network: string } }
    | { readonly type: 'paypal'; readonly paypal: { readonly email?: string } }
    | { readonly type: 'mb_way'; readonly mb_way: { readonly phone: string } };
