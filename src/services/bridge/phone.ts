/**
 * Phone number and WhatsApp address helpers.
 */

export const USER_SERVER = "s.whatsapp.net";

/** "5511999999999@s.whatsapp.net" → "5511999999999" */
export function addressLocalPart(address: string): string {
  const at = address.indexOf("@");
  return at === -1 ? address : address.slice(0, at);
}

export function toUserAddress(localPart: string): string {
  return `${localPart}@${USER_SERVER}`;
}

/**
 * E.164: drop everything but digits and prefix "+".
 * "55 11 99999-9999" → "+5511999999999"
 */
export function formatToE164(phone: string): string {
  return `+${phone.replace(/\D/g, "")}`;
}

/**
 * Alternate form of a Brazilian mobile number, with the ninth digit added
 * (12 digits → 13) or removed (13 → 12). WhatsApp addresses for older
 * accounts often lack it while contacts saved by agents carry it.
 * Returns null for anything that is not a +55 mobile number.
 */
export function brazilianAlternate(e164: string): string | null {
  const digits = e164.replace(/\D/g, "");
  if (!digits.startsWith("55")) return null;

  if (digits.length === 12) {
    return `+${digits.slice(0, 4)}9${digits.slice(4)}`;
  }
  if (digits.length === 13 && digits[4] === "9") {
    return `+${digits.slice(0, 4)}${digits.slice(5)}`;
  }
  return null;
}
