/**
 * backend/src/shared/security/signing-keys.ts
 *
 * WHY:
 * - Fresh signing material for JWT_* env variables, used when setting up or
 *   rotating keys (see generate-keys.ts).
 *
 * ROTATION:
 * 1) generate a new key under a new kid
 * 2) move the old kid and its verify key (secret or public PEM) into JWT_RETIRED_KEYS
 * 3) drop the retired entry once ACCESS_TOKEN_TTL_SECONDS has passed
 */

import { generateKeyPairSync } from 'node:crypto';

import { generateSecureToken } from './token';

export type SigningAlgorithm = 'HS256' | 'RS256';

const RSA_MODULUS_LENGTH = 2048;

// base64url of 48 bytes = 64 characters.
const HS256_SECRET_BYTES = 48;

export type GeneratedSigningKeys = {
  /** env variable → value, PEM newlines escaped as "\n". */
  env: Record<string, string>;
  /** What goes into JWT_RETIRED_KEYS for this kid after the next rotation. */
  verifyKey: string;
};

function escapePem(pem: string): string {
  return pem.trim().replace(/\n/g, '\\n');
}

export function generateSigningKeys(opts: {
  algorithm: SigningAlgorithm;
  keyId: string;
}): GeneratedSigningKeys {
  if (opts.algorithm === 'HS256') {
    const secret = generateSecureToken(HS256_SECRET_BYTES);
    return {
      env: { JWT_ALGORITHM: 'HS256', JWT_KEY_ID: opts.keyId, JWT_SECRET: secret },
      verifyKey: secret,
    };
  }

  const { privateKey, publicKey } = generateKeyPairSync('rsa', {
    modulusLength: RSA_MODULUS_LENGTH,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
  });

  return {
    env: {
      JWT_ALGORITHM: 'RS256',
      JWT_KEY_ID: opts.keyId,
      JWT_PRIVATE_KEY: escapePem(privateKey),
      JWT_PUBLIC_KEY: escapePem(publicKey),
    },
    verifyKey: publicKey,
  };
}
