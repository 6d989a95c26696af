/**
 * Phone number helpers shared by the chat and gateway sides.
 *
 * Chat identifiers arrive as `whatsapp:+254712345678`; the relay stores
 * them without the channel prefix. The gateway wants bare MSISDNs
 * (`254712345678`).
 */

const CHANNEL_PREFIX = /^[a-z]+:/i;

/**
 * Strip a provider channel prefix such as `whatsapp:` or `sms:`.
 */
export function stripChannelPrefix(identifier: string): string {
  return identifier.trim().replace(CHANNEL_PREFIX, '');
}

/**
 * Convert a chat number into the gateway's international format.
 *
 * Only two shapes are rewritten: `+<country><subscriber>` loses its `+`,
 * and a national number with a leading `0` gets the country code instead.
 * Anything else passes through unchanged.
 */
export function toGatewayMsisdn(phoneNumber: string, countryCode: string): string {
  if (phoneNumber.startsWith(`+${countryCode}`)) {
    return phoneNumber.slice(1);
  }
  if (phoneNumber.startsWith('0')) {
    return `${countryCode}${phoneNumber.slice(1)}`;
  }
  return phoneNumber;
}
