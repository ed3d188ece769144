import { Request, Response, NextFunction } from 'express';
import { AuthService } from '../services/authService.js';
import { AuthenticationError, handleError } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';

export interface AuthUser {
    id: string;
}

export interface AuthenticatedRequest extends Request {
    user?: AuthUser;
}

// Cookie first, then `Authorization: Bearer <token>`
export function extractToken(req: Request): string | undefined {
    const cookieToken: unknown = req.cookies?.token;
    if (typeof cookieToken === 'string' && cookieToken) {
        return cookieToken;
    }

    const header = req.headers.authorization;
    if (header?.startsWith('Bearer ')) {
        const token = header.slice('Bearer '.length).trim();
        return token || undefined;
    }
    return undefined;
}

export function requireUserId(req: AuthenticatedRequest): string {
    if (!req.user) {
        throw new AuthenticationError();
    }
    return req.user.id;
}

export function createAuthMiddleware(authService: AuthService) {
    const requireAuth = (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
        const token = extractToken(req);
        if (!token) {
            logger.debug('[AUTH] No token on request', { path: req.path });
            handleError(res, new AuthenticationError('Not authorized - No token'));
            return;
        }

        try {
            req.user = authService.verify(token);
        } catch (error) {
            handleError(res, error);
            return;
        }
        next();
    };

    // Anonymous requests pass through without a user
    const optionalAuth = (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
        const token = extractToken(req);
        if (token) {
            try {
                req.user = authService.verify(token);
            } catch {
                logger.debug('[AUTH] Ignoring invalid token on optional route', { path: req.path });
            }
        }
        next();
    };

    return { requireAuth, optionalAuth };
}

export type AuthMiddleware = ReturnType<typeof createAuthMiddleware>;
