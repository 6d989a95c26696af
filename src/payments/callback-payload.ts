import {
  CallbackDetails,
  UNKNOWN_AMOUNT,
  UNKNOWN_NUMBER,
  UNKNOWN_RECEIPT,
} from './payment.types';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

function asNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  const text = asText(value);
  if (text === undefined) return undefined;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Flatten `CallbackMetadata.Item` into a name → value map.
 */
function metadataOf(callback: JsonObject): JsonObject {
  const metadata = callback.CallbackMetadata;
  if (!isObject(metadata) || !Array.isArray(metadata.Item)) return {};

  const fields: JsonObject = {};
  for (const item of metadata.Item) {
    if (isObject(item) && typeof item.Name === 'string') {
      fields[item.Name] = item.Value;
    }
  }
  return fields;
}

function stkCallbackOf(payload: JsonObject): JsonObject | null {
  const body = payload.Body;
  if (!isObject(body)) return null;
  return isObject(body.stkCallback) ? body.stkCallback : null;
}

/**
 * Pull the fields the relay cares about out of a gateway callback.
 *
 * Accepts both the flat body (`Amount`, `PhoneNumber`, `MpesaReceiptNumber`,
 * `ResultCode` at the top level) and the Daraja envelope
 * (`Body.stkCallback` with `CallbackMetadata.Item`). Missing values become
 * the `UNKNOWN_*` sentinels; a missing or non-numeric result code is `null`.
 */
export function parseCallbackPayload(payload: unknown): CallbackDetails {
  const root = isObject(payload) ? payload : {};
  const envelope = stkCallbackOf(root);
  const source = envelope ?? root;
  const fields = envelope ? { ...metadataOf(envelope), ...envelope } : root;

  return {
    amount: asNumber(fields.Amount) ?? UNKNOWN_AMOUNT,
    phoneNumber: asText(fields.PhoneNumber) ?? UNKNOWN_NUMBER,
    receiptNumber: asText(fields.MpesaReceiptNumber) ?? UNKNOWN_RECEIPT,
    resultCode: asNumber(source.ResultCode) ?? null,
    resultDesc: asText(source.ResultDesc),
    checkoutRequestId: asText(source.CheckoutRequestID),
    merchantRequestId: asText(source.MerchantRequestID),
    accountReference: asText(fields.AccountReference) ?? asText(root.AccountReference),
  };
}
