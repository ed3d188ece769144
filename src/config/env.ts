import { z } from 'zod';
import { LogLevelName } from '../utils/logger.js';

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(5001),
    MONGO_URI: z.string().min(1).optional(),
    JWT_SECRET: z.string().min(1).optional(),
    OPENAI_API_KEY: z.string().min(1).optional(),
    OPENAI_MODEL: z.string().min(1).default('gpt-4'),
    OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    MAX_COMPLETION_TOKENS: z.coerce.number().int().positive().default(1500),
    CONTEXT_TOKEN_BUDGET: z.coerce.number().int().positive().optional(),
    MAX_HISTORY_TURNS: z.coerce.number().int().positive().optional(),
    DEFAULT_AGENT_ID: z.string().min(1).default('startup-strategist'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
}).superRefine((env, ctx) => {
    if (!env.JWT_SECRET && env.NODE_ENV !== 'test') {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['JWT_SECRET'],
            message: 'JWT_SECRET is required'
        });
    }
});

export interface AppConfig {
    nodeEnv: 'development' | 'production' | 'test';
    port: number;
    // Absent: custom bots, history and users live in memory
    mongoUri?: string;
    jwtSecret: string;
    openai: {
        apiKey?: string;
        model: string;
        timeoutMs: number;
        maxCompletionTokens: number;
    };
    context: {
        tokenBudget?: number;
        maxHistoryTurns?: number;
    };
    defaultAgentId: string;
    logLevel: LogLevelName;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
    // `FOO=` in a .env file means "not set"
    const present = Object.fromEntries(
        Object.entries(source).filter(([, value]) => value !== undefined && value.trim() !== '')
    );

    const parsed = envSchema.safeParse(present);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${issues}`);
    }

    const env = parsed.data;
    return {
        nodeEnv: env.NODE_ENV,
        port: env.PORT,
        mongoUri: env.MONGO_URI,
        jwtSecret: env.JWT_SECRET ?? 'test-secret',
        openai: {
            apiKey: env.OPENAI_API_KEY,
            model: env.OPENAI_MODEL,
            timeoutMs: env.OPENAI_TIMEOUT_MS,
            maxCompletionTokens: env.MAX_COMPLETION_TOKENS
        },
        context: {
            tokenBudget: env.CONTEXT_TOKEN_BUDGET,
            maxHistoryTurns: env.MAX_HISTORY_TURNS
        },
        defaultAgentId: env.DEFAULT_AGENT_ID,
        logLevel: env.LOG_LEVEL
    };
}
