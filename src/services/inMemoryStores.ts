// src/services/inMemoryStores.ts
// Process-local stores used by the tests and when no MONGO_URI is configured
import { randomUUID } from 'crypto';
import { CustomAgent, CustomAgentInput, CustomAgentUpdate } from '../types/agent.js';
import { ConversationTurn } from '../types/conversation.js';
import { HistoryUsage, ICustomBotStore, IHistoryStore, IUserStore, NewUser, StoredUser } from '../types/services.js';
import { AppError, NotOwnerError, UnknownAgentError } from '../utils/errorHandler.js';
import { compareByCreation } from './botResolver.js';

function copyAgent(agent: CustomAgent): CustomAgent {
  return {
    ...agent,
    specialties: [...agent.specialties],
    quickActions: [...agent.quickActions],
    createdAt: new Date(agent.createdAt.getTime()),
    updatedAt: new Date(agent.updatedAt.getTime())
  };
}

function applyUpdate(agent: CustomAgent, fields: CustomAgentUpdate): CustomAgent {
  return {
    ...agent,
    name: fields.name ?? agent.name,
    emoji: fields.emoji ?? agent.emoji,
    category: fields.category ?? agent.category,
    description: fields.description ?? agent.description,
    systemPrompt: fields.systemPrompt ?? agent.systemPrompt,
    temperature: fields.temperature ?? agent.temperature,
    specialties: fields.specialties ? [...fields.specialties] : agent.specialties,
    quickActions: fields.quickActions ? [...fields.quickActions] : agent.quickActions
  };
}

export class InMemoryCustomBotStore implements ICustomBotStore {
  private bots = new Map<string, CustomAgent>();

  constructor(
    private now: () => Date = () => new Date(),
    private generateId: () => string = randomUUID
  ) {}

  async create(input: CustomAgentInput, ownerId: string): Promise<CustomAgent> {
    const timestamp = this.now();
    const bot: CustomAgent = {
      name: input.name,
      emoji: input.emoji,
      category: input.category,
      description: input.description,
      systemPrompt: input.systemPrompt,
      temperature: input.temperature,
      specialties: [...input.specialties],
      quickActions: [...input.quickActions],
      id: this.generateId(),
      isCustom: true,
      ownerId,
      createdAt: timestamp,
      updatedAt: timestamp
    };
    this.bots.set(bot.id, bot);
    return copyAgent(bot);
  }

  async list(ownerId: string): Promise<CustomAgent[]> {
    return [...this.bots.values()]
      .filter(bot => bot.ownerId === ownerId)
      .sort(compareByCreation)
      .map(copyAgent);
  }

  async get(id: string): Promise<CustomAgent | null> {
    const bot = this.bots.get(id);
    return bot ? copyAgent(bot) : null;
  }

  async update(id: string, ownerId: string, fields: CustomAgentUpdate): Promise<CustomAgent> {
    const existing = this.requireOwned(id, ownerId);
    const updated: CustomAgent = { ...applyUpdate(existing, fields), updatedAt: this.now() };
    this.bots.set(id, updated);
    return copyAgent(updated);
  }

  async delete(id: string, ownerId: string): Promise<void> {
    this.requireOwned(id, ownerId);
    this.bots.delete(id);
  }

  async deleteAll(ownerId: string): Promise<string[]> {
    const owned = [...this.bots.values()].filter(bot => bot.ownerId === ownerId).sort(compareByCreation);
    for (const bot of owned) {
      this.bots.delete(bot.id);
    }
    return owned.map(bot => bot.id);
  }

  private requireOwned(id: string, ownerId: string): CustomAgent {
    const bot = this.bots.get(id);
    if (!bot) {
      throw new UnknownAgentError(id);
    }
    if (bot.ownerId !== ownerId) {
      throw new NotOwnerError(id);
    }
    return bot;
  }
}

interface StoredConversation {
  userId: string;
  agentId: string;
  turns: ConversationTurn[];
}

function copyTurn(turn: ConversationTurn): ConversationTurn {
  return { ...turn, timestamp: new Date(turn.timestamp.getTime()) };
}

export class InMemoryHistoryStore implements IHistoryStore {
  private conversations = new Map<string, StoredConversation>();

  private key(userId: string, agentId: string): string {
    return JSON.stringify([userId, agentId]);
  }

  async append(userId: string, agentId: string, turn: ConversationTurn): Promise<void> {
    await this.appendExchange(userId, agentId, [turn]);
  }

  async appendExchange(userId: string, agentId: string, turns: readonly ConversationTurn[]): Promise<void> {
    const key = this.key(userId, agentId);
    const conversation = this.conversations.get(key) ?? { userId, agentId, turns: [] };
    conversation.turns.push(...turns.map(copyTurn));
    this.conversations.set(key, conversation);
  }

  async read(userId: string, agentId: string, limit?: number): Promise<ConversationTurn[]> {
    const turns = this.conversations.get(this.key(userId, agentId))?.turns ?? [];
    const selected = limit === undefined ? turns : turns.slice(Math.max(0, turns.length - limit));
    return selected.map(copyTurn);
  }

  async usage(userId: string): Promise<HistoryUsage> {
    let userMessages = 0;
    const agentIds: string[] = [];

    for (const conversation of this.conversations.values()) {
      if (conversation.userId !== userId || conversation.turns.length === 0) {
        continue;
      }
      agentIds.push(conversation.agentId);
      userMessages += conversation.turns.filter(turn => turn.role === 'user').length;
    }

    return { userMessages, agentIds: agentIds.sort() };
  }

  async clear(userId: string, agentId: string): Promise<number> {
    const key = this.key(userId, agentId);
    const count = this.conversations.get(key)?.turns.length ?? 0;
    this.conversations.delete(key);
    return count;
  }
}

export class InMemoryUserStore implements IUserStore {
  private users = new Map<string, StoredUser>();

  constructor(
    private now: () => Date = () => new Date(),
    private generateId: () => string = randomUUID
  ) {}

  async create(user: NewUser): Promise<StoredUser> {
    const email = user.email.toLowerCase();
    if (await this.findByEmail(email)) {
      throw new AppError('User already exists', 400, 'UserExists');
    }
    const stored: StoredUser = {
      id: this.generateId(),
      email,
      name: user.name,
      passwordHash: user.passwordHash,
      createdAt: this.now()
    };
    this.users.set(stored.id, stored);
    return { ...stored };
  }

  async findByEmail(email: string): Promise<StoredUser | null> {
    const wanted = email.toLowerCase();
    for (const user of this.users.values()) {
      if (user.email === wanted) {
        return { ...user };
      }
    }
    return null;
  }

  async findById(id: string): Promise<StoredUser | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }
}
