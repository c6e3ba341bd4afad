import { generateKeyPairSync } from 'crypto';
import * as admin from 'firebase-admin';
import jwt from 'jsonwebtoken';
import { authRouter } from '../auth';
import { APPLE_ISSUER, AppleIdentityVerifier, getAppleIdentityVerifier } from '../../services/appleIdentity';
import { createDomainServiceContainer } from '../../services/domain/serviceContainer';
import { getTokenService } from '../../services/tokenService';
import { createRequest, createResponse, getRouteHandler } from './routeHarness';

jest.mock('../../services/domain/serviceContainer', () => ({
  createDomainServiceContainer: jest.fn(),
}));

jest.mock('../../services/appleIdentity', () => {
  const actual = jest.requireActual('../../services/appleIdentity');
  return { ...actual, getAppleIdentityVerifier: jest.fn() };
});

const createKeyPair = () =>
  generateKeyPairSync('rsa', {
    modulusLength: 2048,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
  });

const appleKeys = createKeyPair();
const AUDIENCE = 'com.example.test';

const identityTokenFor = (subject: string, privateKey: string = appleKeys.privateKey) =>
  jwt.sign({}, privateKey, {
    algorithm: 'RS256',
    keyid: 'test-kid',
    subject,
    issuer: APPLE_ISSUER,
    audience: AUDIENCE,
    expiresIn: '10m',
  });

const base64url = (value: object) => Buffer.from(JSON.stringify(value)).toString('base64url');

describe('auth routes', () => {
  const firestoreMock = admin.firestore as unknown as jest.Mock;
  const createDomainServiceContainerMock =
    createDomainServiceContainer as jest.MockedFunction<typeof createDomainServiceContainer>;

  const userService = {
    getById: jest.fn(),
    upsertById: jest.fn(),
    deleteAccountData: jest.fn(),
  };

  beforeEach(() => {
    jest.clearAllMocks();
    (getAppleIdentityVerifier as jest.Mock).mockReturnValue(
      new AppleIdentityVerifier({ audience: AUDIENCE, resolveSigningKey: async () => appleKeys.publicKey }),
    );
    firestoreMock.mockImplementation(() => ({}) as any);
    createDomainServiceContainerMock.mockReturnValue({ userService } as any);
    userService.upsertById.mockImplementation(async (id: string, updates: any) => ({ id, ...updates }));
  });

  describe('POST /apple', () => {
    const handler = getRouteHandler(authRouter, 'post', '/apple');

    it('creates the user and issues a session token', async () => {
      userService.getById.mockResolvedValue(null);
      const res = createResponse();

      await handler(
        createRequest({
          body: {
            identityToken: identityTokenFor('apple-user-1'),
            userIdentifier: 'apple-user-1',
            email: 'user@example.com',
            firstName: 'Test',
            lastName: 'User',
          },
        }),
        res,
      );

      expect(res.statusCode).toBe(200);
      expect(userService.upsertById).toHaveBeenCalledWith(
        'apple-user-1',
        { email: 'user@example.com', firstName: 'Test', lastName: 'User', fullName: 'Test User' },
        expect.any(Date),
      );
      expect(getTokenService().verify(res.body.jwtToken)).toMatchObject({
        uid: 'apple-user-1',
        email: 'user@example.com',
      });
      expect(res.body.user.id).toBe('apple-user-1');
      expect(res.body.expiresAt).toEqual(expect.any(String));
    });

    it('keeps stored names on later sign-ins', async () => {
      userService.getById.mockResolvedValue({
        id: 'apple-user-1',
        email: 'user@example.com',
        firstName: 'Stored',
        lastName: 'Name',
        fullName: 'Stored Name',
      });
      const res = createResponse();

      await handler(
        createRequest({ body: { identityToken: identityTokenFor('apple-user-1'), userIdentifier: 'apple-user-1' } }),
        res,
      );

      expect(userService.upsertById).toHaveBeenCalledWith(
        'apple-user-1',
        { email: 'user@example.com', firstName: 'Stored', lastName: 'Name', fullName: 'Stored Name' },
        expect.any(Date),
      );
    });

    it('rejects identity tokens issued for another user', async () => {
      const res = createResponse();

      await handler(
        createRequest({ body: { identityToken: identityTokenFor('someone-else'), userIdentifier: 'apple-user-1' } }),
        res,
      );

      expect(res.statusCode).toBe(401);
      expect(res.body.code).toBe('invalid_identity_token');
      expect(userService.upsertById).not.toHaveBeenCalled();
    });

    it('rejects unsigned identity tokens', async () => {
      const unsigned = `${base64url({ alg: 'none', typ: 'JWT' })}.${base64url({ sub: 'apple-user-1' })}.`;
      const res = createResponse();

      await handler(createRequest({ body: { identityToken: unsigned, userIdentifier: 'apple-user-1' } }), res);

      expect(res.statusCode).toBe(401);
      expect(res.body).toEqual({
        code: 'invalid_identity_token',
        message: 'Identity token could not be verified',
      });
      expect(userService.upsertById).not.toHaveBeenCalled();
    });

    it('rejects identity tokens signed with another key', async () => {
      const forged = identityTokenFor('apple-user-1', createKeyPair().privateKey);
      const res = createResponse();

      await handler(createRequest({ body: { identityToken: forged, userIdentifier: 'apple-user-1' } }), res);

      expect(res.statusCode).toBe(401);
      expect(res.body.message).toBe('Identity token could not be verified');
      expect(userService.getById).not.toHaveBeenCalled();
    });
  });

  describe('GET /validate', () => {
    const handler = getRouteHandler(authRouter, 'get', '/validate');

    it('reports whether the bearer token is valid', async () => {
      const token = getTokenService().issue({ id: 'user-1' }).token;
      const valid = createResponse();
      const invalid = createResponse();
      const missing = createResponse();

      await handler(createRequest({ headers: { authorization: `Bearer ${token}` } }), valid);
      await handler(createRequest({ headers: { authorization: 'Bearer nope' } }), invalid);
      await handler(createRequest(), missing);

      expect(valid.body).toEqual({ valid: true });
      expect(invalid.body).toEqual({ valid: false });
      expect(missing.body).toEqual({ valid: false });
    });
  });

  describe('POST /refresh', () => {
    const handler = getRouteHandler(authRouter, 'post', '/refresh');

    it('issues a new session for an existing user', async () => {
      userService.getById.mockResolvedValue({ id: 'user-1', email: null });
      const token = getTokenService().issue({ id: 'user-1' }).token;
      const res = createResponse();

      await handler(createRequest({ headers: { authorization: `Bearer ${token}` } }), res);

      expect(res.statusCode).toBe(200);
      expect(getTokenService().verify(res.body.jwtToken).uid).toBe('user-1');
    });

    it('rejects tokens for deleted users', async () => {
      userService.getById.mockResolvedValue(null);
      const token = getTokenService().issue({ id: 'user-1' }).token;
      const res = createResponse();

      await handler(createRequest({ headers: { authorization: `Bearer ${token}` } }), res);

      expect(res.statusCode).toBe(401);
      expect(res.body.message).toBe('User no longer exists');
    });

    it('rejects missing and malformed tokens', async () => {
      const missing = createResponse();
      const malformed = createResponse();

      await handler(createRequest(), missing);
      await handler(createRequest({ headers: { authorization: 'Bearer nope' } }), malformed);

      expect(missing.statusCode).toBe(401);
      expect(malformed.statusCode).toBe(401);
      expect(malformed.body).toEqual({ code: 'unauthorized', message: 'Token is invalid' });
    });
  });

  it('POST /logout acknowledges', async () => {
    const res = createResponse();

    await getRouteHandler(authRouter, 'post', '/logout')(createRequest(), res);

    expect(res.body).toEqual({ status: 'ok' });
  });

  it('DELETE /delete-account removes the caller data', async () => {
    userService.deleteAccountData.mockResolvedValue(5);
    const res = createResponse();

    await getRouteHandler(authRouter, 'delete', '/delete-account')(createRequest(), res);

    expect(userService.deleteAccountData).toHaveBeenCalledWith('user-1');
    expect(res.body).toEqual({ status: 'ok' });
  });
});
