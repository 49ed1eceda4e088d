import { randomBytes, scrypt, timingSafeEqual } from 'crypto';

export const API_KEY_HASH_LENGTH = 32;

const HEX_TEXT = /^\\x(?:[0-9a-f]{2})+$/i;

export function deriveKey(secret: string, salt: Buffer, length: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(secret, salt, length, (error, derived) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(derived);
    });
  });
}

export async function hashApiKey(apiKey: string): Promise<{ hash: Buffer; salt: Buffer }> {
  const salt = randomBytes(16);
  const hash = await deriveKey(apiKey, salt, API_KEY_HASH_LENGTH);
  return { hash, salt };
}

export async function verifyApiKey(apiKey: string, hash: Buffer, salt: Buffer): Promise<boolean> {
  const derived = await deriveKey(apiKey, salt, hash.length);
  return derived.length === hash.length && timingSafeEqual(derived, hash);
}

/** pg returns BYTEA as a Buffer; pg-mem may hand back the `\x` hex text form. */
export function normaliseBytea(value: Buffer | string): Buffer {
  if (Buffer.isBuffer(value)) {
    const text = value.toString('latin1');
    return HEX_TEXT.test(text) ? Buffer.from(text.slice(2), 'hex') : value;
  }

  const hex = value.startsWith('\\x') ? value.slice(2) : value;
  return Buffer.from(hex, 'hex');
}
