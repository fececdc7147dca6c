/**
 * Phone Number Utility Functions
 *
 * Caller numbers reach the gateway from telephony providers, the voice agent,
 * web forms and the CRM, in whatever format each one uses.
 */

/**
 * Mask phone number for logging
 *
 * Example: +12025551234 -> +1202555****
 */
export const maskPhoneNumber = (phoneNumber: string | null | undefined): string => {
  if (!phoneNumber || phoneNumber.length < 4) {
    return '****';
  }

  return `${phoneNumber.slice(0, -4)}****`;
};

/**
 * Return the first non-empty candidate, in the order given
 */
export const firstPresent = (...candidates: Array<string | null | undefined>): string | undefined => {
  for (const candidate of candidates) {
    if (typeof candidate === 'string' && candidate.trim() !== '') {
      return candidate;
    }
  }
  return undefined;
};
