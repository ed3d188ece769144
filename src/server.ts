import dotenv from "dotenv";
import { createApp } from './app.js';
import { connectDB, disconnectDB } from './config/database.js';
import { loadConfig } from './config/env.js';
import { createServices, createStores } from './services/index.js';
import { logger, parseLogLevel } from './utils/logger.js';

// Load environment variables
dotenv.config();

async function main(): Promise<void> {
    const config = loadConfig();
    logger.setLevel(parseLogLevel(config.logLevel));

    if (config.mongoUri) {
        await connectDB(config.mongoUri);
    } else {
        logger.warn('[SERVER] MONGO_URI not set, bots, history and users are kept in memory');
    }
    if (!config.openai.apiKey) {
        logger.warn('[SERVER] OPENAI_API_KEY not set, chat requests will fail with AuthError');
    }

    const services = createServices(config, createStores(config.mongoUri ? 'mongo' : 'memory'));
    const app = createApp(config, services);

    let server = app.listen(config.port, () => {
        logger.info(`[SERVER] Running on http://localhost:${config.port}`);
    });

    const shutdown = (signal: string) => {
        logger.info(`[SERVER] ${signal} received, shutting down`);
        server.close(() => {
            if (!config.mongoUri) {
                return;
            }
            disconnectDB().catch(error => {
                logger.error('[SERVER] Error closing the database connection', error);
                process.exitCode = 1;
            });
        });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    server.on('error', (e: NodeJS.ErrnoException) => {
        if (e.code === 'EADDRINUSE') {
            const newPort = config.port + 1;
            logger.warn(`[SERVER] Port ${config.port} is already in use. Trying port ${newPort}`);
            setTimeout(() => {
                server.close();
                const newServer = app.listen(newPort, () => {
                    logger.info(`[SERVER] Running on http://localhost:${newPort}`);
                });
                server = newServer;

                newServer.on('error', (err: Error) => {
                    logger.error('[SERVER] Error starting server on new port', err);
                    process.exitCode = 1;
                });
            }, 1000);
        } else {
            logger.error('[SERVER] Server error', e);
            process.exitCode = 1;
        }
    });
}

main().catch(error => {
    logger.error('[SERVER] Failed to start', error);
    process.exitCode = 1;
});
