import { describe, it, expect, vi } from 'vitest';
import { createAuthModule } from '../../../src/modules/auth';
import { InMemRefreshTokenStore } from '../../../src/modules/auth/dal/inmem-refresh-token.store';
import { InMemUserRepo } from '../../../src/modules/users/dal/inmem-user.repo';
import { AppError } from '../../../src/shared/http/errors';
import { logger } from '../../../src/shared/logger/logger';
import { JwtAccessTokenCodec } from '../../../src/shared/security/jwt-access-token-codec';
import { Sha256TokenHasher } from '../../../src/shared/security/sha256-token-hasher';
import { FakePasswordHasher } from '../../helpers/fake-password-hasher';
import { createTestClock } from '../../helpers/test-clock';

const SECRET = 'test-secret-test-secret-test-secret-0001';

async function setup() {
  const clock = createTestClock();
  const tokenHasher = new Sha256TokenHasher();
  const passwordHasher = new FakePasswordHasher();
  const userRepo = new InMemUserRepo(clock.now);
  const refreshTokens = new InMemRefreshTokenStore(tokenHasher, clock.now);
  const codec = new JwtAccessTokenCodec({
    signing: { algorithm: 'HS256', secret: SECRET },
    keyId: 'primary',
    issuer: 'jwt-auth',
    clock: clock.now,
  });

  const { authService } = createAuthModule({
    userRepo,
    refreshTokens,
    codec,
    passwordHasher,
    tokenHasher,
    logger,
    accessTokenTtlSeconds: 1800,
    refreshTokenTtlSeconds: 604800,
  });

  const user = await userRepo.insert({
    lastName: 'Tester',
    firstName: 'Terry',
    middleName: null,
    login: 'tterry',
    passwordHash: await passwordHasher.hash('pw-1'),
    role: 'student',
    gender: 'female',
    className: '10A',
    graduationYear: 2032,
  });

  return { clock, userRepo, refreshTokens, authService, user };
}

async function expectAppError(promise: Promise<unknown>, status: number, message: string) {
  const err: unknown = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  expect(err).toBeInstanceOf(AppError);
  expect(err).toMatchObject({ status, message });
}

describe('AuthService', () => {
  describe('login', () => {
    it('returns a bearer token pair whose access token names the user and role', async () => {
      const { authService, user } = await setup();

      const pair = await authService.login({ login: 'tterry', password: 'pw-1' });

      expect(pair.token_type).toBe('bearer');
      expect(pair.expires_in).toBe(1800);
      expect(authService.verify(pair.access_token)).toEqual({
        userId: user.id,
        role: 'student',
        permissions: ['profile:read', 'grades:read', 'schedule:read'],
      });
    });

    it('fails unknown login and wrong password with the same 401', async () => {
      const { authService } = await setup();

      await expectAppError(
        authService.login({ login: 'ghost', password: 'pw-1' }),
        401,
        'Invalid login or password.',
      );
      await expectAppError(
        authService.login({ login: 'tterry', password: 'nope' }),
        401,
        'Invalid login or password.',
      );
    });

    it('never logs the raw login', async () => {
      const { authService } = await setup();
      const infoSpy = vi.spyOn(logger, 'info');

      await authService.login({ login: 'tterry', password: 'pw-1' });

      expect(infoSpy).toHaveBeenCalledWith(
        'auth.login.start',
        expect.objectContaining({ loginKey: new Sha256TokenHasher().hash('tterry') }),
      );
      expect(JSON.stringify(infoSpy.mock.calls)).not.toContain('"tterry"');
    });
  });

  describe('refresh', () => {
    it('rotates the refresh token and accepts each token only once', async () => {
      const { authService } = await setup();
      const first = await authService.login({ login: 'tterry', password: 'pw-1' });

      const second = await authService.refresh({ refreshToken: first.refresh_token });

      expect(second.refresh_token).not.toBe(first.refresh_token);
      await expectAppError(
        authService.refresh({ refreshToken: first.refresh_token }),
        401,
        'Invalid or expired refresh token.',
      );
      await expect(authService.refresh({ refreshToken: second.refresh_token })).resolves.toMatchObject({
        token_type: 'bearer',
      });
    });

    it('lets exactly one of two concurrent refreshes succeed', async () => {
      const { authService } = await setup();
      const pair = await authService.login({ login: 'tterry', password: 'pw-1' });

      const results = await Promise.allSettled([
        authService.refresh({ refreshToken: pair.refresh_token }),
        authService.refresh({ refreshToken: pair.refresh_token }),
      ]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      expect(results.filter((r) => r.status === 'rejected')).toHaveLength(1);
    });

    it('issues the access token with the role the user has now', async () => {
      const { authService, userRepo, user } = await setup();
      const pair = await authService.login({ login: 'tterry', password: 'pw-1' });

      await userRepo.update(user.id, { role: 'teacher' });
      const next = await authService.refresh({ refreshToken: pair.refresh_token });

      expect(authService.verify(next.access_token).role).toBe('teacher');
      expect(authService.verify(pair.access_token).role).toBe('student');
    });

    it('rejects a refresh token whose user was deleted', async () => {
      const { authService, userRepo, refreshTokens, user } = await setup();
      const pair = await authService.login({ login: 'tterry', password: 'pw-1' });
      const revokeSpy = vi.spyOn(refreshTokens, 'revoke');

      await userRepo.delete(user.id);

      await expectAppError(
        authService.refresh({ refreshToken: pair.refresh_token }),
        401,
        'Invalid or expired refresh token.',
      );
      expect(revokeSpy).toHaveBeenCalledTimes(1);
    });

    it('rejects an expired refresh token', async () => {
      const { authService, clock } = await setup();
      const pair = await authService.login({ login: 'tterry', password: 'pw-1' });

      clock.advanceSeconds(604800);

      await expectAppError(
        authService.refresh({ refreshToken: pair.refresh_token }),
        401,
        'Invalid or expired refresh token.',
      );
    });
  });

  describe('logout', () => {
    it('is idempotent and makes the refresh token unusable', async () => {
      const { authService } = await setup();
      const pair = await authService.login({ login: 'tterry', password: 'pw-1' });

      await authService.logout({ refreshToken: pair.refresh_token });
      await authService.logout({ refreshToken: pair.refresh_token });
      await authService.logout({ refreshToken: 'never-issued' });

      await expectAppError(
        authService.refresh({ refreshToken: pair.refresh_token }),
        401,
        'Invalid or expired refresh token.',
      );
    });

    it('leaves the access token valid until it expires', async () => {
      const { authService, user } = await setup();
      const pair = await authService.login({ login: 'tterry', password: 'pw-1' });

      await authService.logout({ refreshToken: pair.refresh_token });

      expect(authService.verify(pair.access_token).userId).toBe(user.id);
    });
  });

  describe('verify', () => {
    it('rejects an expired access token with 401', async () => {
      const { authService, clock } = await setup();
      const pair = await authService.login({ login: 'tterry', password: 'pw-1' });

      clock.advanceSeconds(1800);

      expect(authService.tryVerify(pair.access_token)).toEqual({ ok: false, reason: 'expired' });
      expect(() => authService.verify(pair.access_token)).toThrow('Invalid or expired access token.');
    });

    it('reports malformed input without throwing from tryVerify', async () => {
      const { authService } = await setup();

      expect(authService.tryVerify('abc')).toEqual({ ok: false, reason: 'malformed' });
    });
  });

  describe('getCurrentUser', () => {
    it('returns the stored user for a verified principal', async () => {
      const { authService, user } = await setup();
      const pair = await authService.login({ login: 'tterry', password: 'pw-1' });

      await expect(authService.getCurrentUser(authService.verify(pair.access_token))).resolves.toEqual(
        user,
      );
    });

    it('fails with 401 once the user is gone', async () => {
      const { authService, userRepo, user } = await setup();
      const pair = await authService.login({ login: 'tterry', password: 'pw-1' });
      const principal = authService.verify(pair.access_token);

      await userRepo.delete(user.id);

      await expectAppError(
        authService.getCurrentUser(principal),
        401,
        'Invalid or expired access token.',
      );
    });
  });
});
