const CHANNEL_PREFIX = /^(whatsapp|rcs|messenger):/i;

/**
 * E.164-ish normalization for inbound sender ids.
 * Channel prefixes ("whatsapp:+1555...") are dropped so one person keeps one session.
 */
export function normalizePhone(raw: string): string {
  const phone = raw.trim().replace(CHANNEL_PREFIX, "");
  const digits = phone.replace(/\D/g, "");
  if (digits.length === 11 && digits.startsWith("1")) {
    return `+${digits}`;
  }
  if (digits.length === 10) {
    return `+1${digits}`;
  }
  if (phone.startsWith("+") && digits) {
    return `+${digits}`;
  }
  return digits ? `+${digits}` : "";
}
