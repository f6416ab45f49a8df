import { createHash } from 'crypto';
import * as jose from 'jose';
import { v4 as uuidv4 } from 'uuid';
import { Clock, systemClock, toEpochSeconds } from '../../shared/clock';
import { componentLogger } from '../../shared/logger';
import { AccessClaims, IssuedTokens, RefreshTokenRecord, Role } from '../../shared/types';
import { RefreshTokenStore } from '../store/refreshTokenStore';

const log = componentLogger('tokens');

const ALGORITHM = 'HS256';

export type ValidationFailure = 'malformed' | 'invalid_signature' | 'expired';

export type ValidationResult =
  | { ok: true; claims: AccessClaims }
  | { ok: false; reason: ValidationFailure };

export type RotationFailure = 'expired' | 'revoked' | 'reused' | 'unknown';

export type RotationResult =
  | { ok: true; tokens: IssuedTokens }
  | { ok: false; reason: RotationFailure };

export interface TokenAuthorityOptions {
  jwtSecret: string;
  issuer: string;
  audience: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  reuseRevokesFamily: boolean;
  clock?: Clock;
}

export function hashRefreshToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

function isRoleList(value: unknown): value is Role[] {
  return Array.isArray(value) && value.every(role => typeof role === 'string');
}

function readHeaderAlgorithm(token: string): string | null {
  try {
    return jose.decodeProtectedHeader(token).alg ?? null;
  } catch {
    return null;
  }
}

/**
 * Issues, validates and rotates credential pairs.
 *
 * Access tokens are stateless HS256 JWTs. Refresh tokens are opaque random
 * values; only their SHA-256 hash reaches the store, and every rotation goes
 * through the store's atomic claim so a refresh token is spent exactly once.
 */
export class TokenAuthority {
  private readonly secret: Uint8Array;
  private readonly clock: Clock;

  constructor(
    private readonly store: RefreshTokenStore,
    private readonly options: TokenAuthorityOptions
  ) {
    this.secret = new TextEncoder().encode(options.jwtSecret);
    this.clock = options.clock ?? systemClock;
  }

  async issue(subjectId: string, roles: readonly Role[], familyId: string = uuidv4()): Promise<IssuedTokens> {
    const now = this.clock.now();
    const issuedAt = toEpochSeconds(now);
    const accessExpiresAt = (issuedAt + this.options.accessTtlSeconds) * 1000;
    const refreshExpiresAt = now + this.options.refreshTtlSeconds * 1000;
    const tokenId = uuidv4();
    const roleList = [...new Set(roles)];

    const accessToken = await new jose.SignJWT({ roles: roleList, fid: familyId })
      .setProtectedHeader({ alg: ALGORITHM, typ: 'JWT' })
      .setSubject(subjectId)
      .setJti(tokenId)
      .setIssuedAt(issuedAt)
      .setExpirationTime(toEpochSeconds(accessExpiresAt))
      .setIssuer(this.options.issuer)
      .setAudience(this.options.audience)
      .sign(this.secret);

    const refreshToken = uuidv4();
    const record: RefreshTokenRecord = {
      tokenHash: hashRefreshToken(refreshToken),
      subjectId,
      roles: roleList,
      familyId,
      issuedAt: now,
      expiresAt: refreshExpiresAt,
      consumed: false,
      revoked: false,
    };
    await this.store.insert(record);

    return {
      accessToken,
      refreshToken,
      accessExpiresAt,
      refreshExpiresAt,
      claims: {
        subjectId,
        roles: roleList,
        familyId,
        tokenId,
        issuedAt,
        expiresAt: toEpochSeconds(accessExpiresAt),
      },
      record,
    };
  }

  /** Signature and expiry check only; never touches the store. */
  async validate(accessToken: string): Promise<ValidationResult> {
    if (accessToken.split('.').length !== 3) {
      return { ok: false, reason: 'malformed' };
    }

    const alg = readHeaderAlgorithm(accessToken);
    if (alg === null) {
      return { ok: false, reason: 'malformed' };
    }
    // SECURITY: alg=none and algorithm substitution are refused before verification
    if (alg !== ALGORITHM) {
      return { ok: false, reason: 'invalid_signature' };
    }

    let payload: jose.JWTPayload;
    try {
      ({ payload } = await jose.jwtVerify(accessToken, this.secret, {
        algorithms: [ALGORITHM],
        issuer: this.options.issuer,
        audience: this.options.audience,
        currentDate: new Date(this.clock.now()),
        clockTolerance: 0,
      }));
    } catch (error) {
      if (error instanceof jose.errors.JWTExpired) {
        return { ok: false, reason: 'expired' };
      }
      if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
        return { ok: false, reason: 'invalid_signature' };
      }
      return { ok: false, reason: 'malformed' };
    }

    const { sub, jti, iat, exp } = payload;
    const { roles, fid } = payload;
    if (
      typeof sub !== 'string' || !sub ||
      typeof jti !== 'string' ||
      typeof iat !== 'number' ||
      typeof exp !== 'number' ||
      typeof fid !== 'string' ||
      !isRoleList(roles)
    ) {
      return { ok: false, reason: 'malformed' };
    }

    return {
      ok: true,
      claims: { subjectId: sub, roles, familyId: fid, tokenId: jti, issuedAt: iat, expiresAt: exp },
    };
  }

  /**
   * Spends a refresh token and issues its successor in the same family.
   * A second presentation of a spent token is `reused`, never a success.
   */
  async rotate(refreshToken: string): Promise<RotationResult> {
    if (!refreshToken) {
      return { ok: false, reason: 'unknown' };
    }

    const claim = await this.store.claim(hashRefreshToken(refreshToken), this.clock.now());

    switch (claim.status) {
      case 'claimed': {
        const { subjectId, roles, familyId } = claim.record;
        const tokens = await this.issue(subjectId, roles, familyId);
        log.debug('Refresh token rotated', { subjectId, familyId });
        return { ok: true, tokens };
      }
      case 'reused': {
        const { subjectId, familyId } = claim.record;
        let revoked = 0;
        if (this.options.reuseRevokesFamily) {
          revoked = await this.store.revokeFamily(familyId);
        }
        log.warn('Refresh token reuse detected', {
          subjectId,
          familyId,
          familyRevoked: this.options.reuseRevokesFamily,
          revoked,
        });
        return { ok: false, reason: 'reused' };
      }
      case 'revoked':
        return { ok: false, reason: 'revoked' };
      case 'expired':
        return { ok: false, reason: 'expired' };
      case 'not_found':
        return { ok: false, reason: 'unknown' };
    }
  }

  /** Logout: revokes the presented token and every token of its family. */
  async revokeToken(refreshToken: string): Promise<number> {
    const record = await this.store.findByHash(hashRefreshToken(refreshToken));
    if (!record) {
      return 0;
    }
    const count = await this.store.revokeFamily(record.familyId);
    log.debug('Refresh family revoked', { subjectId: record.subjectId, familyId: record.familyId, count });
    return count;
  }

  async revokeSubject(subjectId: string): Promise<number> {
    const count = await this.store.revokeSubject(subjectId);
    log.debug('Subject refresh tokens revoked', { subjectId, count });
    return count;
  }
}
