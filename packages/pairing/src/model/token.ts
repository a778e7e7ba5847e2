import { customAlphabet } from 'nanoid';

export const SESSION_TOKEN_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const SESSION_TOKEN_LENGTH = 32;

const TOKEN_PATTERN = new RegExp(`^[${SESSION_TOKEN_ALPHABET}]{${SESSION_TOKEN_LENGTH}}$`);

/**
 * Generate a new session token: 32 characters of A-Z and 0-9.
 */
export const generateSessionToken: () => string = customAlphabet(SESSION_TOKEN_ALPHABET, SESSION_TOKEN_LENGTH);

export function isValidSessionToken(token: string): boolean {
  return TOKEN_PATTERN.test(token);
}
