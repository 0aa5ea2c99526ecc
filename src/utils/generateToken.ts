import { randomBytes } from 'crypto';

/** Bytes of entropy in an issued API key. */
export const API_KEY_BYTES = 32;

/**
 * Generate a URL-safe API key from random bytes
 */
export const generateApiKey = (): string => randomBytes(API_KEY_BYTES).toString('base64url');
