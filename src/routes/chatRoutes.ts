import { Router } from 'express';
import { ChatController } from '../controllers/chatController.js';
import { AuthMiddleware } from '../middleware/authMiddleware.js';

export function createChatRoutes(controller: ChatController, auth: AuthMiddleware): Router {
    const router = Router();

    router.use(auth.requireAuth);

    // Send a message to the selected agent
    router.post('/message', controller.sendMessage.bind(controller));

    // Send one of the agent's quick actions
    router.post('/quick-action', controller.runQuickAction.bind(controller));

    router.get('/:agentId/history', controller.getHistory.bind(controller));
    router.get('/:agentId/history/export', controller.exportHistory.bind(controller));
    router.delete('/:agentId/history', controller.clearHistory.bind(controller));

    return router;
}
