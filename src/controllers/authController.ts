import { CookieOptions, Request, Response } from 'express';
import { AuthenticatedRequest, requireUserId } from '../middleware/authMiddleware.js';
import { AuthService } from '../services/authService.js';
import { UsageService } from '../services/usageService.js';
import { handleError } from '../utils/errorHandler.js';

const THIRTY_DAYS_MS = 30 * 24 * 60 * 60 * 1000;

export class AuthController {
    constructor(
        private authService: AuthService,
        private usageService: UsageService,
        private secureCookies: boolean
    ) {}

    private cookieOptions(): CookieOptions {
        return {
            httpOnly: true,
            secure: this.secureCookies,
            sameSite: 'strict',
            maxAge: THIRTY_DAYS_MS
        };
    }

    async register(req: Request, res: Response) {
        try {
            const { user, token } = await this.authService.register(req.body);
            res.cookie('token', token, this.cookieOptions());
            return res.status(201).json({ user });
        } catch (error) {
            return handleError(res, error);
        }
    }

    async login(req: Request, res: Response) {
        try {
            const { user, token } = await this.authService.login(req.body);
            res.cookie('token', token, this.cookieOptions());
            return res.json({ user });
        } catch (error) {
            return handleError(res, error);
        }
    }

    async logout(req: Request, res: Response) {
        res.cookie('token', '', {
            httpOnly: true,
            expires: new Date(0)
        });
        return res.status(200).json({ message: 'Logged out successfully' });
    }

    async getProfile(req: AuthenticatedRequest, res: Response) {
        try {
            const user = await this.authService.getProfile(requireUserId(req));
            return res.json({ user });
        } catch (error) {
            return handleError(res, error);
        }
    }

    async getStats(req: AuthenticatedRequest, res: Response) {
        try {
            const stats = await this.usageService.getStats(requireUserId(req));
            return res.json({ stats });
        } catch (error) {
            return handleError(res, error);
        }
    }
}
