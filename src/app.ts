import express, { Express } from "express";
import cookieParser from 'cookie-parser';
import { AppConfig } from './config/env.js';
import { AgentController } from './controllers/agentController.js';
import { AuthController } from './controllers/authController.js';
import { BotController } from './controllers/botController.js';
import { ChatController } from './controllers/chatController.js';
import { createAuthMiddleware } from './middleware/authMiddleware.js';
import { createAgentRoutes } from './routes/agentRoutes.js';
import { createAuthRoutes } from './routes/authRoutes.js';
import { createBotRoutes } from './routes/botRoutes.js';
import { createChatRoutes } from './routes/chatRoutes.js';
import { ServiceContainer } from './services/index.js';
import { logger } from './utils/logger.js';

export function createApp(config: AppConfig, services: ServiceContainer): Express {
    const app = express();

    // Middleware
    app.use(express.json({ limit: '1mb' }));
    app.use(cookieParser());

    // Bodies carry passwords and prompts, so only the route is logged
    app.use((req, res, next) => {
        logger.debug('[HTTP] Incoming request', { method: req.method, path: req.path });
        next();
    });

    const auth = createAuthMiddleware(services.authService);

    // API Routes
    app.use('/api/auth', createAuthRoutes(new AuthController(services.authService, services.usageService, config.nodeEnv === 'production'), auth));
    app.use('/api/agents', createAgentRoutes(new AgentController(services.botResolver), auth));
    app.use('/api/bots', createBotRoutes(new BotController(services.customBotService), auth));
    app.use('/api/chat', createChatRoutes(new ChatController(services.chatService), auth));

    app.get('/api/health', (req, res) => {
        res.json({ status: 'ok', storage: services.storage });
    });

    app.use('/api', (req, res) => {
        res.status(404).json({ error: 'Not found', code: 'NotFound' });
    });

    return app;
}
