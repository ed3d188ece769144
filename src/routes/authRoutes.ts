import { Router } from 'express';
import { AuthController } from '../controllers/authController.js';
import { AuthMiddleware } from '../middleware/authMiddleware.js';

export function createAuthRoutes(controller: AuthController, auth: AuthMiddleware): Router {
    const router = Router();

    router.post('/register', controller.register.bind(controller));
    router.post('/login', controller.login.bind(controller));
    router.post('/logout', controller.logout.bind(controller));
    router.get('/profile', auth.requireAuth, controller.getProfile.bind(controller));
    router.get('/profile/stats', auth.requireAuth, controller.getStats.bind(controller));

    return router;
}
