import jwt from 'jsonwebtoken';
import { AuthenticationError } from './errorHandler.js';

export interface TokenPayload {
    id: string;
}

export const generateToken = (userId: string, secret: string): string => {
    return jwt.sign({ id: userId }, secret, {
        expiresIn: '30d'
    });
};

export const verifyToken = (token: string, secret: string): TokenPayload => {
    let decoded: string | jwt.JwtPayload;
    try {
        decoded = jwt.verify(token, secret);
    } catch {
        throw new AuthenticationError('Not authorized - Invalid token');
    }
    if (typeof decoded === 'string' || typeof decoded.id !== 'string') {
        throw new AuthenticationError('Not authorized - Invalid token');
    }
    return { id: decoded.id };
};
