import { createCipheriv, createDecipheriv, createHash, createHmac, randomBytes } from 'node:crypto';
import type { CryptoProvider } from '../../application/ports.js';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;
const TAG_LENGTH = 16;

export interface NodeCryptoOptions {
  /** Any secret; it is hashed down to a 256-bit AES key. */
  readonly encryptionKey: string | Uint8Array;
  readonly hmacKey: string | Uint8Array;
}

/**
 * AES-256-GCM payload encryption (`iv | tag | ciphertext`) and
 * HMAC-SHA256 signatures (lowercase hex) on top of `node:crypto`.
 */
export function createNodeCrypto(options: NodeCryptoOptions): CryptoProvider {
  const key = createHash('sha256').update(options.encryptionKey).digest();

  return {
    encrypt(plaintext: Uint8Array): Uint8Array | null {
      const iv = randomBytes(IV_LENGTH);
      const cipher = createCipheriv(ALGORITHM, key, iv);
      const body = Buffer.concat([cipher.update(plaintext), cipher.final()]);
      return new Uint8Array(Buffer.concat([iv, cipher.getAuthTag(), body]));
    },

    decrypt(ciphertext: Uint8Array): Uint8Array | null {
      if (ciphertext.length < IV_LENGTH + TAG_LENGTH) return null;
      const data = Buffer.from(ciphertext);
      const iv = data.subarray(0, IV_LENGTH);
      const tag = data.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
      const body = data.subarray(IV_LENGTH + TAG_LENGTH);
      try {
        const decipher = createDecipheriv(ALGORITHM, key, iv);
        decipher.setAuthTag(tag);
        return new Uint8Array(Buffer.concat([decipher.update(body), decipher.final()]));
      } catch {
        // Tampered payload or wrong key.
        return null;
      }
    },

    hmac(data: Uint8Array): string {
      return createHmac('sha256', options.hmacKey).update(data).digest('hex');
    },
  };
}
