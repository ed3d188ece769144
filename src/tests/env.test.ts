import { loadConfig } from '../config/env.js';

describe('loadConfig', () => {
    it('fills in defaults', () => {
        expect(loadConfig({ NODE_ENV: 'test' })).toEqual({
            nodeEnv: 'test',
            port: 5001,
            mongoUri: undefined,
            jwtSecret: 'test-secret',
            openai: {
                apiKey: undefined,
                model: 'gpt-4',
                timeoutMs: 30000,
                maxCompletionTokens: 1500
            },
            context: {
                tokenBudget: undefined,
                maxHistoryTurns: undefined
            },
            defaultAgentId: 'startup-strategist',
            logLevel: 'info'
        });
    });

    it('reads and coerces values', () => {
        const config = loadConfig({
            NODE_ENV: 'production',
            PORT: '8080',
            JWT_SECRET: 'test-secret',
            MONGO_URI: 'mongodb://localhost:27017/agents',
            OPENAI_MODEL: 'gpt-4-turbo',
            CONTEXT_TOKEN_BUDGET: '3000',
            MAX_HISTORY_TURNS: '12',
            LOG_LEVEL: 'debug'
        });

        expect(config.port).toBe(8080);
        expect(config.mongoUri).toBe('mongodb://localhost:27017/agents');
        expect(config.openai.model).toBe('gpt-4-turbo');
        expect(config.context).toEqual({ tokenBudget: 3000, maxHistoryTurns: 12 });
        expect(config.logLevel).toBe('debug');
    });

    it('treats empty values as unset', () => {
        const config = loadConfig({ NODE_ENV: 'test', MONGO_URI: '', OPENAI_API_KEY: '  ' });

        expect(config.mongoUri).toBeUndefined();
        expect(config.openai.apiKey).toBeUndefined();
    });

    it('requires JWT_SECRET outside tests', () => {
        expect(() => loadConfig({ NODE_ENV: 'development' })).toThrow(
            'Invalid configuration: JWT_SECRET: JWT_SECRET is required'
        );
    });

    it('rejects values of the wrong shape', () => {
        expect(() => loadConfig({ NODE_ENV: 'test', PORT: 'eighty' })).toThrow(/^Invalid configuration: PORT: /);
        expect(() => loadConfig({ NODE_ENV: 'test', LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
    });
});
