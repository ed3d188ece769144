import { Router } from 'express';
import { AgentController } from '../controllers/agentController.js';
import { AuthMiddleware } from '../middleware/authMiddleware.js';

export function createAgentRoutes(controller: AgentController, auth: AuthMiddleware): Router {
    const router = Router();

    router.get('/', auth.optionalAuth, controller.listAgents.bind(controller));
    router.get('/categories', auth.optionalAuth, controller.listCategories.bind(controller));
    router.get('/:agentId', auth.optionalAuth, controller.getAgent.bind(controller));

    return router;
}
