/**
 * Sign in with Apple identity tokens
 *
 * Tokens are RS256 JWTs signed with one of Apple's rotating keys. The key is
 * picked by the token's `kid` from Apple's JWKS endpoint; `iss` must be Apple
 * and `aud` the app's bundle id.
 */

import jwt, { JwtPayload } from 'jsonwebtoken';
import jwksClient from 'jwks-rsa';
import { appleAuthConfig } from '../config';

export const APPLE_ISSUER = 'https://appleid.apple.com';
export const APPLE_JWKS_URI = 'https://appleid.apple.com/auth/keys';

export type SigningKeyResolver = (kid: string) => Promise<string>;

export interface AppleIdentity {
    subject: string;
    email: string | null;
}

export class IdentityTokenError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'IdentityTokenError';
    }
}

export type AppleIdentityVerifierOptions = {
    audience?: string;
    resolveSigningKey?: SigningKeyResolver;
};

function createJwksResolver(jwksUri: string): SigningKeyResolver {
    const client = jwksClient({
        jwksUri,
        cache: true,
        cacheMaxAge: 24 * 60 * 60 * 1000,
        rateLimit: true,
        jwksRequestsPerMinute: 10,
    });
    return async (kid) => {
        const key = await client.getSigningKey(kid);
        return key.getPublicKey();
    };
}

export class AppleIdentityVerifier {
    private readonly audience: string;
    private readonly resolveSigningKey: SigningKeyResolver;

    constructor(options: AppleIdentityVerifierOptions = {}) {
        this.audience = options.audience ?? appleAuthConfig.bundleId;
        this.resolveSigningKey = options.resolveSigningKey ?? createJwksResolver(APPLE_JWKS_URI);
    }

    async verify(identityToken: string): Promise<AppleIdentity> {
        const decoded = jwt.decode(identityToken, { complete: true });
        const kid = decoded?.header.kid;
        if (!decoded || decoded.header.alg !== 'RS256' || !kid) {
            throw new IdentityTokenError('Identity token is malformed');
        }

        let publicKey: string;
        try {
            publicKey = await this.resolveSigningKey(kid);
        } catch (error) {
            throw new IdentityTokenError(
                `No Apple signing key for kid ${kid}: ${error instanceof Error ? error.message : String(error)}`,
            );
        }

        let payload: string | JwtPayload;
        try {
            payload = jwt.verify(identityToken, publicKey, {
                algorithms: ['RS256'],
                issuer: APPLE_ISSUER,
                audience: this.audience,
            });
        } catch (error) {
            throw new IdentityTokenError(
                `Identity token rejected: ${error instanceof Error ? error.message : String(error)}`,
            );
        }

        if (typeof payload === 'string' || typeof payload.sub !== 'string') {
            throw new IdentityTokenError('Identity token has no subject');
        }
        return {
            subject: payload.sub,
            email: typeof payload.email === 'string' ? payload.email : null,
        };
    }
}

let verifierInstance: AppleIdentityVerifier | null = null;

export const getAppleIdentityVerifier = (): AppleIdentityVerifier => {
    if (!verifierInstance) {
        verifierInstance = new AppleIdentityVerifier();
    }
    return verifierInstance;
};
