/**
 * backend/src/shared/security/jwt-access-token-codec.ts
 *
 * WHY:
 * - Concrete AccessTokenCodec on top of jsonwebtoken (HS256 or RS256).
 * - Key material is parsed once, in the constructor. A bad secret or PEM throws
 *   here, at startup, never on the request path.
 * - Retired keys (verify-only) keep tokens signed before a key rotation valid
 *   until they expire. Only the current key signs.
 *
 * HOW TO USE:
 * - const codec = new JwtAccessTokenCodec({ signing, keyId, issuer })
 * - const token = codec.issue({ subject, role, permissions, ttlSeconds })
 * - const claims = codec.decode(token) // throws AccessTokenError
 *
 * VERIFY ORDER:
 * 1) structural decode (not a JWT → malformed)
 * 2) kid selects the current or a retired key (unknown key → invalid_signature)
 * 3) signature + algorithm + issuer, then expiry (jsonwebtoken checks expiry last,
 *    so an expired token with a bad signature is reported as invalid_signature)
 * 4) claim shape incl. type === "access" (→ malformed)
 */

import { createPrivateKey, createPublicKey, randomUUID } from 'node:crypto';
import type { KeyObject } from 'node:crypto';

import jwt from 'jsonwebtoken';
import { z } from 'zod';

import type { JwtSigningConfig, RetiredVerifyKey } from '../../app/config';
import type { Clock } from '../clock';
import { systemClock } from '../clock';
import { USER_ROLES } from '../../modules/users/user.types';
import { PERMISSIONS } from '../../modules/auth/policies/role-permissions.policy';
import {
  AccessTokenError,
  MIN_HS256_SECRET_LENGTH,
  type AccessTokenClaims,
  type AccessTokenCodec,
  type AccessTokenFailureReason,
  type IssueAccessTokenParams,
  type JwkSet,
  type PublicJwk,
} from './access-token-codec';

const ACCESS_TOKEN_TYPE = 'access';

const AccessPayloadSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(USER_ROLES),
  permissions: z.array(z.enum(PERMISSIONS)),
  type: z.literal(ACCESS_TOKEN_TYPE),
  iat: z.number().int(),
  exp: z.number().int(),
  iss: z.string(),
  jti: z.string().min(1),
});

type VerifyKey = string | KeyObject;

type SigningKeys =
  | { algorithm: 'HS256'; signKey: string; verifyKey: string }
  | { algorithm: 'RS256'; signKey: KeyObject; verifyKey: KeyObject };

const SIGNATURE_FAILURE_MESSAGES = [
  'invalid signature',
  'invalid algorithm',
  'jwt signature is required',
];

function loadSigningKeys(signing: JwtSigningConfig): SigningKeys {
  if (signing.algorithm === 'HS256') {
    if (signing.secret.length < MIN_HS256_SECRET_LENGTH) {
      throw new Error(
        `HS256 secret must be at least ${MIN_HS256_SECRET_LENGTH} characters (got ${signing.secret.length})`,
      );
    }
    return { algorithm: 'HS256', signKey: signing.secret, verifyKey: signing.secret };
  }

  let privateKey: KeyObject;
  let publicKey: KeyObject;
  try {
    privateKey = createPrivateKey(signing.privateKeyPem);
    publicKey = createPublicKey(signing.publicKeyPem);
  } catch (err) {
    throw new Error('RS256 key material could not be parsed as PEM', { cause: err });
  }

  if (privateKey.asymmetricKeyType !== 'rsa' || publicKey.asymmetricKeyType !== 'rsa') {
    throw new Error('RS256 requires an RSA key pair');
  }

  const derivedModulus = createPublicKey(privateKey).export({ format: 'jwk' }).n;
  if (derivedModulus !== publicKey.export({ format: 'jwk' }).n) {
    throw new Error('RS256 public key does not match the private key');
  }

  return { algorithm: 'RS256', signKey: privateKey, verifyKey: publicKey };
}

function loadRetiredKey(algorithm: SigningKeys['algorithm'], retired: RetiredVerifyKey): VerifyKey {
  if (algorithm === 'HS256') {
    if (retired.key.length < MIN_HS256_SECRET_LENGTH) {
      throw new Error(
        `Retired HS256 secret "${retired.keyId}" must be at least ${MIN_HS256_SECRET_LENGTH} characters`,
      );
    }
    return retired.key;
  }

  let publicKey: KeyObject;
  try {
    publicKey = createPublicKey(retired.key);
  } catch (err) {
    throw new Error(`Retired RS256 key "${retired.keyId}" could not be parsed as PEM`, { cause: err });
  }
  if (publicKey.asymmetricKeyType !== 'rsa') {
    throw new Error(`Retired RS256 key "${retired.keyId}" is not an RSA key`);
  }
  return publicKey;
}

function toSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function classifyVerifyError(err: unknown): AccessTokenFailureReason {
  // TokenExpiredError extends JsonWebTokenError, check it first.
  if (err instanceof jwt.TokenExpiredError) return 'expired';

  if (err instanceof jwt.JsonWebTokenError) {
    if (SIGNATURE_FAILURE_MESSAGES.includes(err.message)) return 'invalid_signature';
    if (err.message.startsWith('jwt issuer invalid')) return 'invalid_signature';
    return 'malformed';
  }

  throw err;
}

export class JwtAccessTokenCodec implements AccessTokenCodec {
  private readonly keys: SigningKeys;
  private readonly keyId: string;
  private readonly issuer: string;
  private readonly clock: Clock;
  // kid → verification key; the current key first, then retired ones.
  private readonly verifyKeys: Map<string, VerifyKey>;

  constructor(opts: {
    signing: JwtSigningConfig;
    keyId: string;
    issuer: string;
    retiredKeys?: readonly RetiredVerifyKey[];
    clock?: Clock;
  }) {
    this.keys = loadSigningKeys(opts.signing);
    this.keyId = opts.keyId;
    this.issuer = opts.issuer;
    this.clock = opts.clock ?? systemClock;

    this.verifyKeys = new Map<string, VerifyKey>([[opts.keyId, this.keys.verifyKey]]);
    for (const retired of opts.retiredKeys ?? []) {
      if (this.verifyKeys.has(retired.keyId)) {
        throw new Error(`Key id "${retired.keyId}" is configured more than once`);
      }
      this.verifyKeys.set(retired.keyId, loadRetiredKey(this.keys.algorithm, retired));
    }
  }

  issue(params: IssueAccessTokenParams): string {
    const iat = toSeconds(this.clock());

    return jwt.sign(
      {
        sub: params.subject,
        role: params.role,
        permissions: [...params.permissions],
        type: ACCESS_TOKEN_TYPE,
        iat,
        exp: iat + params.ttlSeconds,
        iss: this.issuer,
        jti: randomUUID(),
      },
      this.keys.signKey,
      { algorithm: this.keys.algorithm, keyid: this.keyId },
    );
  }

  decode(token: string): AccessTokenClaims {
    const decoded = jwt.decode(token, { complete: true });
    if (!decoded || typeof decoded.payload === 'string') {
      throw new AccessTokenError('malformed');
    }

    const kid = decoded.header.kid;
    const verifyKey = kid === undefined ? undefined : this.verifyKeys.get(kid);
    if (verifyKey === undefined) {
      throw new AccessTokenError('invalid_signature');
    }

    let verified: string | jwt.JwtPayload;
    try {
      verified = jwt.verify(token, verifyKey, {
        algorithms: [this.keys.algorithm],
        issuer: this.issuer,
        clockTimestamp: toSeconds(this.clock()),
      });
    } catch (err) {
      throw new AccessTokenError(classifyVerifyError(err));
    }

    const parsed = AccessPayloadSchema.safeParse(verified);
    if (!parsed.success) {
      throw new AccessTokenError('malformed');
    }

    const claims = parsed.data;
    return {
      subject: claims.sub,
      role: claims.role,
      permissions: claims.permissions,
      tokenId: claims.jti,
      issuedAt: new Date(claims.iat * 1000),
      expiresAt: new Date(claims.exp * 1000),
    };
  }

  jwks(): JwkSet {
    if (this.keys.algorithm !== 'RS256') return { keys: [] };

    const keys: PublicJwk[] = [];
    for (const [kid, key] of this.verifyKeys) {
      if (typeof key === 'string') continue;
      keys.push({ ...key.export({ format: 'jwk' }), kid, alg: this.keys.algorithm, use: 'sig' });
    }
    return { keys };
  }
}
