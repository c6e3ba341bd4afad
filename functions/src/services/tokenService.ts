/**
 * Session tokens
 *
 * The API issues its own HS256 JWTs after Sign in with Apple. Tokens carry
 * the user id as `sub` and an optional email claim.
 */

import jwt, { JwtPayload } from 'jsonwebtoken';
import { authConfig } from '../config';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SessionClaims {
    uid: string;
    email: string | null;
    expiresAt: Date;
}

export interface IssuedToken {
    token: string;
    expiresAt: string;
}

export class TokenError extends Error {
    readonly code: 'token_expired' | 'token_invalid';

    constructor(code: 'token_expired' | 'token_invalid', message: string) {
        super(message);
        this.name = 'TokenError';
        this.code = code;
    }
}

export type TokenServiceOptions = {
    secret?: string;
    ttlDays?: number;
    refreshGraceDays?: number;
    issuer?: string;
    now?: () => Date;
};

function toClaims(payload: string | JwtPayload): SessionClaims {
    if (typeof payload === 'string' || typeof payload.sub !== 'string' || typeof payload.exp !== 'number') {
        throw new TokenError('token_invalid', 'Token payload is malformed');
    }
    return {
        uid: payload.sub,
        email: typeof payload.email === 'string' ? payload.email : null,
        expiresAt: new Date(payload.exp * 1000),
    };
}

export class TokenService {
    private readonly secret: string;
    private readonly ttlDays: number;
    private readonly refreshGraceDays: number;
    private readonly issuer: string;
    private readonly now: () => Date;

    constructor(options: TokenServiceOptions = {}) {
        this.secret = options.secret ?? authConfig.jwtSecret;
        this.ttlDays = options.ttlDays ?? authConfig.tokenTtlDays;
        this.refreshGraceDays = options.refreshGraceDays ?? authConfig.refreshGraceDays;
        this.issuer = options.issuer ?? authConfig.issuer;
        this.now = options.now ?? (() => new Date());
    }

    private requireSecret(): string {
        if (!this.secret) {
            throw new Error('JWT_SECRET is not configured');
        }
        return this.secret;
    }

    issue(user: { id: string; email?: string | null }): IssuedToken {
        const issuedAtSeconds = Math.floor(this.now().getTime() / 1000);
        const expiresAtSeconds = issuedAtSeconds + Math.round((this.ttlDays * DAY_MS) / 1000);

        const token = jwt.sign(
            {
                ...(user.email ? { email: user.email } : {}),
                iat: issuedAtSeconds,
                exp: expiresAtSeconds,
            },
            this.requireSecret(),
            {
                algorithm: 'HS256',
                subject: user.id,
                issuer: this.issuer,
            },
        );

        return {
            token,
            expiresAt: new Date(expiresAtSeconds * 1000).toISOString(),
        };
    }

    verify(token: string): SessionClaims {
        try {
            const payload = jwt.verify(token, this.requireSecret(), {
                algorithms: ['HS256'],
                issuer: this.issuer,
                clockTimestamp: Math.floor(this.now().getTime() / 1000),
            });
            return toClaims(payload);
        } catch (error) {
            if (error instanceof TokenError) throw error;
            if (error instanceof jwt.TokenExpiredError) {
                throw new TokenError('token_expired', 'Token has expired');
            }
            throw new TokenError('token_invalid', 'Token is invalid');
        }
    }

    /**
     * Accepts a token that is still valid or expired less than the refresh
     * grace window ago.
     */
    verifyForRefresh(token: string): SessionClaims {
        let claims: SessionClaims;
        try {
            claims = toClaims(
                jwt.verify(token, this.requireSecret(), {
                    algorithms: ['HS256'],
                    issuer: this.issuer,
                    ignoreExpiration: true,
                }),
            );
        } catch (error) {
            if (error instanceof TokenError) throw error;
            throw new TokenError('token_invalid', 'Token is invalid');
        }

        const graceEnds = claims.expiresAt.getTime() + this.refreshGraceDays * DAY_MS;
        if (this.now().getTime() > graceEnds) {
            throw new TokenError('token_expired', 'Token is too old to refresh');
        }
        return claims;
    }
}

let tokenServiceInstance: TokenService | null = null;

export const getTokenService = (): TokenService => {
    if (!tokenServiceInstance) {
        tokenServiceInstance = new TokenService();
    }
    return tokenServiceInstance;
};
