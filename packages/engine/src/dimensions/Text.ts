/**
 * @fileoverview Textual identifiers
 *
 * Email, Url, PhoneNumber and CreditCardNumber: matched verbatim, resolved
 * to a normalized string.
 *
 * @module @spanwise/engine/dimensions/Text
 */

import { defineDimension } from "../contracts/Dimension.js";
import { isRecord } from "../util/json.js";

export interface EmailData {
    readonly value: string;
}

export type EmailValue = { value: string };

export const Email = defineDimension<EmailData, EmailValue>({
    name     : "Email",
    wireName : "email",
    resolve  : ({ value }) => ({ value: { value }, latent: false }),
    isPayload: (raw: unknown): raw is EmailData => isRecord(raw) && typeof raw.value === "string",
});

export interface UrlData {
    readonly value: string;
    readonly domain: string;
}

export type UrlValue = { value: string; domain: string };

export const Url = defineDimension<UrlData, UrlValue>({
    name     : "Url",
    wireName : "url",
    resolve  : ({ value, domain }) => ({ value: { value, domain: domain.toLowerCase() }, latent: false }),
    isPayload: (raw: unknown): raw is UrlData =>
        isRecord(raw) && typeof raw.value === "string" && typeof raw.domain === "string",
});

export interface PhoneNumberData {
    /** Country calling code without "+" */
    readonly prefix: string | null;
    readonly number: string;
    readonly extension: string | null;
}

export type PhoneNumberValue = { value: string };

/**
 * "(+33) 612345678 ext 12"; separators in the number are dropped.
 */
export function formatPhoneNumber({ prefix, number, extension }: PhoneNumberData): string {
    const digits = number.replace(/[^\d]/g, "");
    const parts = [prefix ? `(+${prefix}) ${digits}` : digits];
    if (extension) {
        parts.push(`ext ${extension}`);
    }
    return parts.join(" ");
}

export const PhoneNumber = defineDimension<PhoneNumberData, PhoneNumberValue>({
    name     : "PhoneNumber",
    wireName : "phone-number",
    resolve  : (data) => {
        const value = formatPhoneNumber(data);
        return value === "" ? null : { value: { value }, latent: false };
    },
    isPayload: (raw: unknown): raw is PhoneNumberData =>
        isRecord(raw) &&
        (raw.prefix === null || typeof raw.prefix === "string") &&
        typeof raw.number === "string" &&
        (raw.extension === null || typeof raw.extension === "string"),
});

export interface CreditCardNumberData {
    readonly number: string;
    readonly issuer: string;
}

export type CreditCardNumberValue = { value: string; issuer: string };

export const CreditCardNumber = defineDimension<CreditCardNumberData, CreditCardNumberValue>({
    name     : "CreditCardNumber",
    wireName : "credit-card-number",
    resolve  : ({ number, issuer }) => ({ value: { value: number.replace(/[\s-]/g, ""), issuer }, latent: false }),
    isPayload: (raw: unknown): raw is CreditCardNumberData =>
        isRecord(raw) && typeof raw.number === "string" && typeof raw.issuer === "string",
});
