import crypto from 'crypto';
import { SignatureError } from '../errors/connectorErrors.js';
import { err, ok, type Result } from '../flows/result.js';

export type SignatureAlgorithm = 'sha1' | 'sha256' | 'sha512';
export type SignatureEncoding = 'hex' | 'base64';

/** Webhook body exactly as received; a string is taken as its UTF-8 bytes. */
export type WebhookPayload = string | Buffer;

export function payloadBytes(rawPayload: WebhookPayload): Buffer {
    return typeof rawPayload === 'string' ? Buffer.from(rawPayload, 'utf8') : rawPayload;
}

export interface ParsedSignatureHeader {
    readonly signatures: readonly string[];
    /** Unix seconds, for schemes that sign a timestamp */
    readonly timestamp?: number;
}

export interface SignatureScheme {
    readonly algorithm: SignatureAlgorithm;
    readonly encoding: SignatureEncoding;
    /** Replay window; absent means the scheme carries no timestamp */
    readonly toleranceSeconds?: number;
    parseHeader(header: string): ParsedSignatureHeader | undefined;
    signedPayload(rawPayload: Buffer, timestamp?: number): Buffer;
}

/**
 * The header is the signature of the raw body.
 */
export function plainHmacScheme(algorithm: SignatureAlgorithm, encoding: SignatureEncoding): SignatureScheme {
    return {
        algorithm,
        encoding,
        parseHeader: header => {
            const signature = header.trim();
            return signature === '' ? undefined : { signatures: [signature] };
        },
        signedPayload: rawPayload => rawPayload
    };
}

export interface TimestampedSchemeOptions {
    readonly algorithm: SignatureAlgorithm;
    readonly encoding: SignatureEncoding;
    readonly toleranceSeconds: number;
    readonly timestampKey?: string;
    readonly signatureKey?: string;
}

/**
 * Header of the form `t=1700000000,v1=<sig>[,v1=<sig>]`; the signed payload
 * is `<t>.<raw body>`. Several signatures may be present during secret rotation.
 */
export function timestampedHmacScheme(options: TimestampedSchemeOptions): SignatureScheme {
    const timestampKey = options.timestampKey ?? 't';
    const signatureKey = options.signatureKey ?? 'v1';

    return {
        algorithm: options.algorithm,
        encoding: options.encoding,
        toleranceSeconds: options.toleranceSeconds,
        parseHeader: header => {
            let timestamp: number | undefined;
            const signatures: string[] = [];

            for (const part of header.split(',')) {
                const separator = part.indexOf('=');
                if (separator <= 0) continue;
                const key = part.slice(0, separator).trim();
                const value = part.slice(separator + 1).trim();
                if (key === timestampKey && /^\d+$/.test(value)) {
                    timestamp = Number(value);
                } else if (key === signatureKey && value !== '') {
                    signatures.push(value);
                }
            }

            if (timestamp === undefined || signatures.length === 0) return undefined;
            return { signatures, timestamp };
        },
        signedPayload: (rawPayload, timestamp) => Buffer.concat([Buffer.from(`${timestamp ?? ''}.`, 'utf8'), rawPayload])
    };
}

export function computeSignature(scheme: SignatureScheme, secret: string, payload: WebhookPayload): string {
    return crypto.createHmac(scheme.algorithm, secret).update(payloadBytes(payload)).digest(scheme.encoding);
}

const SIGNATURE_FORMAT: Record<SignatureEncoding, RegExp> = {
    hex: /^(?:[0-9a-f]{2})+$/i,
    base64: /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/
};

// Buffer.from stops at the first character outside the encoding, so the format is checked first.
function signaturesMatch(expected: string, provided: string, encoding: SignatureEncoding): boolean {
    if (!SIGNATURE_FORMAT[encoding].test(provided)) return false;

    const expectedBuffer = Buffer.from(expected, encoding);
    const providedBuffer = Buffer.from(provided, encoding);

    return expectedBuffer.length === providedBuffer.length
        && crypto.timingSafeEqual(expectedBuffer, providedBuffer);
}

/**
 * Checks a webhook signature over the exact received bytes.
 * Runs in constant time with respect to the signature contents.
 */
export function verifySignature(
    scheme: SignatureScheme,
    connector: string,
    rawPayload: WebhookPayload,
    signatureHeader: string | undefined,
    secret: string | undefined,
    now: Date
): Result<void, SignatureError> {
    if (signatureHeader === undefined || signatureHeader.trim() === '') {
        return err(new SignatureError('missing_header', connector));
    }
    if (secret === undefined || secret === '') {
        return err(new SignatureError('missing_secret', connector));
    }

    const parsed = scheme.parseHeader(signatureHeader);
    if (!parsed) {
        return err(new SignatureError('malformed_header', connector));
    }

    const expected = computeSignature(scheme, secret, scheme.signedPayload(payloadBytes(rawPayload), parsed.timestamp));
    const matched = parsed.signatures.some(candidate => signaturesMatch(expected, candidate, scheme.encoding));
    if (!matched) {
        return err(new SignatureError('mismatch', connector));
    }

    if (scheme.toleranceSeconds !== undefined && parsed.timestamp !== undefined) {
        const ageSeconds = Math.abs(Math.floor(now.getTime() / 1000) - parsed.timestamp);
        if (ageSeconds > scheme.toleranceSeconds) {
            return err(new SignatureError('timestamp_out_of_tolerance', connector));
        }
    }

    return ok(undefined);
}
