import { Router } from 'express';
import { BotController } from '../controllers/botController.js';
import { AuthMiddleware } from '../middleware/authMiddleware.js';

export function createBotRoutes(controller: BotController, auth: AuthMiddleware): Router {
    const router = Router();

    router.use(auth.requireAuth);
    router.get('/', controller.listBots.bind(controller));
    router.post('/', controller.createBot.bind(controller));
    router.delete('/', controller.deleteAllBots.bind(controller));
    router.patch('/:botId', controller.updateBot.bind(controller));
    router.delete('/:botId', controller.deleteBot.bind(controller));

    return router;
}
