/**
 * Identifier Generator
 *
 * Produces the (public packet id, secret management id) pair for a packet.
 * Each id is drawn from its own call to the CSPRNG, so neither can be
 * computed from the other. The fixed prefixes keep the two id spaces
 * disjoint; the random bodies share nothing.
 */

import { randomBytes } from 'crypto';

/** No 0/O/1/I, so printed ids survive being read aloud */
export const ID_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';

export const PACKET_ID_PREFIX = 'P';
export const MANAGEMENT_ID_PREFIX = 'M';

/** 12 chars × 5 bits = 60 bits */
export const PACKET_ID_BODY_LENGTH = 12;
/** 24 chars × 5 bits = 120 bits; the secret half gets the stronger id */
export const MANAGEMENT_ID_BODY_LENGTH = 24;

export interface IdentifierPair {
  packetId: string;
  managementId: string;
}

export type IdentifierGenerator = () => IdentifierPair;

export type RandomSource = (size: number) => Buffer;

/**
 * Random string over ID_ALPHABET. The alphabet has 32 symbols, so taking
 * the low 5 bits of each byte is unbiased.
 */
export function randomToken(length: number, random: RandomSource = randomBytes): string {
  const bytes = random(length);
  let token = '';
  for (let i = 0; i < length; i++) {
    const byte = bytes[i] ?? 0;
    token += ID_ALPHABET.charAt(byte & 0x1f);
  }
  return token;
}

export function generateIdentifierPair(random: RandomSource = randomBytes): IdentifierPair {
  return {
    packetId: `${PACKET_ID_PREFIX}${randomToken(PACKET_ID_BODY_LENGTH, random)}`,
    managementId: `${MANAGEMENT_ID_PREFIX}${randomToken(MANAGEMENT_ID_BODY_LENGTH, random)}`,
  };
}

const PACKET_ID_PATTERN = new RegExp(`^${PACKET_ID_PREFIX}[${ID_ALPHABET}]{${PACKET_ID_BODY_LENGTH}}$`);
const MANAGEMENT_ID_PATTERN = new RegExp(
  `^${MANAGEMENT_ID_PREFIX}[${ID_ALPHABET}]{${MANAGEMENT_ID_BODY_LENGTH}}$`
);

/**
 * Cheap shape check used before touching the store. Callers must answer a
 * malformed id exactly like an unknown one.
 */
export function isWellFormedIdentifier(identifier: string, kind: 'main' | 'management'): boolean {
  return (kind === 'main' ? PACKET_ID_PATTERN : MANAGEMENT_ID_PATTERN).test(identifier);
}
