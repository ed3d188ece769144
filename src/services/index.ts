import { AppConfig } from '../config/env.js';
import { PREDEFINED_AGENTS } from '../config/predefinedAgents.js';
import { CompletionClient, ICustomBotStore, IHistoryStore, IUserStore } from '../types/services.js';
import { OpenAICompletionClient } from './aiService.js';
import { AuthService } from './authService.js';
import { BotResolver } from './botResolver.js';
import { ChatService } from './chatService.js';
import { MongoCustomBotStore } from './customBotStore.js';
import { CustomBotService } from './customBotService.js';
import { MongoHistoryStore } from './historyStore.js';
import { InMemoryCustomBotStore, InMemoryHistoryStore, InMemoryUserStore } from './inMemoryStores.js';
import { UsageService } from './usageService.js';
import { MongoUserStore } from './userStore.js';

export type StorageKind = 'mongo' | 'memory';

export interface StoreSet {
    kind: StorageKind;
    customBots: ICustomBotStore;
    history: IHistoryStore;
    users: IUserStore;
}

export interface ServiceContainer {
    storage: StorageKind;
    botResolver: BotResolver;
    customBotService: CustomBotService;
    chatService: ChatService;
    authService: AuthService;
    usageService: UsageService;
}

export function createStores(kind: StorageKind): StoreSet {
    if (kind === 'mongo') {
        return {
            kind,
            customBots: new MongoCustomBotStore(),
            history: new MongoHistoryStore(),
            users: new MongoUserStore()
        };
    }
    return {
        kind,
        customBots: new InMemoryCustomBotStore(),
        history: new InMemoryHistoryStore(),
        users: new InMemoryUserStore()
    };
}

// Initialize services in dependency order
export function createServices(
    config: AppConfig,
    stores: StoreSet,
    completionClient: CompletionClient = new OpenAICompletionClient({
        apiKey: config.openai.apiKey,
        timeoutMs: config.openai.timeoutMs,
        maxCompletionTokens: config.openai.maxCompletionTokens
    })
): ServiceContainer {
    const botResolver = new BotResolver(stores.customBots, PREDEFINED_AGENTS);

    return {
        storage: stores.kind,
        botResolver,
        customBotService: new CustomBotService(stores.customBots, stores.history, PREDEFINED_AGENTS),
        chatService: new ChatService(botResolver, stores.history, completionClient, {
            defaultAgentId: config.defaultAgentId,
            defaultModel: config.openai.model,
            maxCompletionTokens: config.openai.maxCompletionTokens,
            contextTokenBudget: config.context.tokenBudget,
            maxHistoryTurns: config.context.maxHistoryTurns
        }),
        authService: new AuthService(stores.users, config.jwtSecret),
        usageService: new UsageService(stores.history, stores.customBots)
    };
}
