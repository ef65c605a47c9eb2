/**
 * Destination rules
 *
 * A destination is either a phone number (normalized to a messaging contact
 * URI) or an absolute http/https URL. Everything else is rejected, which
 * keeps `javascript:`, `data:` and friends out of the redirect path.
 */

import { ValidationError } from '../utils/errors.js';
import type { DestinationPrefill } from '../types/index.js';

export interface DestinationRules {
  /** Prepended to 10-digit national numbers, e.g. `91` */
  defaultCountryCode: string;
  /** Contact URI prefix, e.g. `https://wa.me/` */
  contactUriBase: string;
}

export type Destination =
  | { kind: 'contact'; digits: string; target: string }
  | { kind: 'url'; target: string };

export const MAX_DESTINATION_LENGTH = 2048;

const INVALID_DESTINATION = 'Enter a valid phone number or URL';

const PHONE_CHARS = /^[+\d\s().-]+$/;
const NATIONAL_NUMBER_DIGITS = 10;
const MIN_PHONE_DIGITS = 11;
const MAX_PHONE_DIGITS = 15;

const IPV4_ADDRESS = /^\d{1,3}(?:\.\d{1,3}){3}$/;

const SCHEME = /^[a-z][a-z\d+.-]*:/i;
const HOST_WITH_PORT = /^[^:/?#]+:\d+(?:[/?#]|$)/;

/**
 * Strip formatting from a phone number and apply the default country code.
 * Returns null when the result is not a plausible international number.
 */
export function normalizePhoneNumber(input: string, defaultCountryCode: string): string | null {
  const trimmed = input.trim();
  if (!PHONE_CHARS.test(trimmed)) {
    return null;
  }

  let digits = trimmed.replace(/\D/g, '');
  if (digits.length === NATIONAL_NUMBER_DIGITS) {
    digits = `${defaultCountryCode}${digits}`;
  }

  if (digits.length < MIN_PHONE_DIGITS || digits.length > MAX_PHONE_DIGITS) {
    return null;
  }
  return digits;
}

/**
 * Parse a URL destination, adding `https://` when no scheme is given.
 * Returns the WHATWG serialization, or null when the URL is not acceptable.
 */
export function normalizeUrl(input: string): string | null {
  const trimmed = input.trim();
  const hasScheme = SCHEME.test(trimmed) && !HOST_WITH_PORT.test(trimmed);
  const candidate = hasScheme ? trimmed : `https://${trimmed}`;

  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    return null;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return null;
  }
  if (url.username !== '' || url.password !== '') {
    return null;
  }

  const host = url.hostname;
  const dotted = host.includes('.') && !host.startsWith('.') && !host.endsWith('.');
  if (host !== 'localhost' && !dotted) {
    return null;
  }

  return url.href;
}

/**
 * Validate and canonicalize a submitted destination
 * @throws ValidationError with a user-facing message
 */
export function normalizeDestination(raw: string, rules: DestinationRules): Destination {
  const trimmed = raw.trim();
  if (trimmed === '') {
    throw new ValidationError(INVALID_DESTINATION, 'destination');
  }
  if (trimmed.length > MAX_DESTINATION_LENGTH) {
    throw new ValidationError(
      `Destination must be at most ${MAX_DESTINATION_LENGTH} characters`,
      'destination'
    );
  }

  // A dotted quad is a host, even though it only holds phone characters
  if (PHONE_CHARS.test(trimmed) && !IPV4_ADDRESS.test(trimmed)) {
    const digits = normalizePhoneNumber(trimmed, rules.defaultCountryCode);
    if (!digits) {
      throw new ValidationError('Enter a valid phone number with country code', 'destination');
    }
    return { kind: 'contact', digits, target: `${rules.contactUriBase}${digits}` };
  }

  const url = normalizeUrl(trimmed);
  if (!url) {
    throw new ValidationError(
      SCHEME.test(trimmed) && !HOST_WITH_PORT.test(trimmed) && !/^https?:/i.test(trimmed)
        ? 'Only http and https links are allowed'
        : INVALID_DESTINATION,
      'destination'
    );
  }
  return { kind: 'url', target: url };
}

/**
 * Split a stored target back into the form field that produced it
 */
export function describeTarget(target: string, rules: DestinationRules): DestinationPrefill {
  if (target.startsWith(rules.contactUriBase)) {
    const digits = target.slice(rules.contactUriBase.length);
    if (/^\d+$/.test(digits)) {
      return { kind: 'contact', phoneNumber: `+${digits}` };
    }
  }
  return { kind: 'url', url: target };
}
