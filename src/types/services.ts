// src/types/services.ts
import { CustomAgent, CustomAgentInput, CustomAgentUpdate } from './agent.js';
import { ChatMessage, ConversationTurn } from './conversation.js';

export interface ICustomBotStore {
    create(input: CustomAgentInput, ownerId: string): Promise<CustomAgent>;

    // Oldest first
    list(ownerId: string): Promise<CustomAgent[]>;

    get(id: string): Promise<CustomAgent | null>;

    // Both throw UnknownAgentError for a missing id and NotOwnerError for someone else's bot
    update(id: string, ownerId: string, fields: CustomAgentUpdate): Promise<CustomAgent>;
    delete(id: string, ownerId: string): Promise<void>;

    // Ids of the removed bots
    deleteAll(ownerId: string): Promise<string[]>;
}

export interface HistoryUsage {
    userMessages: number;
    agentIds: string[];
}

export interface IHistoryStore {
    append(userId: string, agentId: string, turn: ConversationTurn): Promise<void>;

    // All turns or none: a question is never stored without its answer
    appendExchange(userId: string, agentId: string, turns: readonly ConversationTurn[]): Promise<void>;

    // Oldest first; with a limit, only the newest `limit` turns
    read(userId: string, agentId: string, limit?: number): Promise<ConversationTurn[]>;

    usage(userId: string): Promise<HistoryUsage>;
    clear(userId: string, agentId: string): Promise<number>;
}

export interface StoredUser {
    id: string;
    email: string;
    name: string;
    passwordHash: string;
    createdAt: Date;
}

export interface NewUser {
    email: string;
    name: string;
    passwordHash: string;
}

export interface IUserStore {
    create(user: NewUser): Promise<StoredUser>;
    findByEmail(email: string): Promise<StoredUser | null>;
    findById(id: string): Promise<StoredUser | null>;
}

export interface CompletionClient {
    complete(messages: ChatMessage[], temperature: number, model: string): Promise<string>;
}
