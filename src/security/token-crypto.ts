/**
 * Social access tokens at rest — AES-256-GCM, key = SHA-256(TOKEN_ENCRYPTION_KEY).
 *
 * Format: `v1.<iv>.<tag>.<ciphertext>`, each part base64url.
 */
import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'node:crypto';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';

const VERSION = 'v1';
const IV_BYTES = 12;

function keyFrom(secret: string): Buffer {
  return createHash('sha256').update(secret, 'utf8').digest();
}

export function encryptToken(plain: string, secret: string = env.TOKEN_ENCRYPTION_KEY): string {
  const iv = randomBytes(IV_BYTES);
  const cipher = createCipheriv('aes-256-gcm', keyFrom(secret), iv);
  const ciphertext = Buffer.concat([cipher.update(plain, 'utf8'), cipher.final()]);
  const tag = cipher.getAuthTag();
  return [VERSION, iv.toString('base64url'), tag.toString('base64url'), ciphertext.toString('base64url')].join('.');
}

/** Plaintext token, or null when the value is missing, malformed or fails authentication. */
export function decryptToken(
  value: string | null | undefined,
  secret: string = env.TOKEN_ENCRYPTION_KEY,
): string | null {
  if (!value) return null;
  const [version, iv, tag, ciphertext] = value.split('.');
  if (version !== VERSION || !iv || !tag || ciphertext === undefined) return null;

  try {
    const decipher = createDecipheriv('aes-256-gcm', keyFrom(secret), Buffer.from(iv, 'base64url'));
    decipher.setAuthTag(Buffer.from(tag, 'base64url'));
    const plain = Buffer.concat([
      decipher.update(Buffer.from(ciphertext, 'base64url')),
      decipher.final(),
    ]).toString('utf8');
    return plain || null;
  } catch (err) {
    logger.warn('Token decryption failed', { error: err instanceof Error ? err.message : String(err) });
    return null;
  }
}
