// src/services/customBotStore.ts
import CustomBot, { ICustomBot } from '../models/customBotModel.js';
import { CustomAgent, CustomAgentInput, CustomAgentUpdate } from '../types/agent.js';
import { ICustomBotStore } from '../types/services.js';
import { NotOwnerError, UnknownAgentError } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';
import { withStore } from '../utils/withStore.js';

export function toCustomAgent(doc: ICustomBot): CustomAgent {
  return {
    id: doc.botId,
    name: doc.name,
    emoji: doc.emoji ?? '',
    category: doc.category,
    description: doc.description,
    systemPrompt: doc.systemPrompt,
    temperature: doc.temperature,
    specialties: [...(doc.specialties ?? [])],
    quickActions: [...(doc.quickActions ?? [])],
    isCustom: true,
    ownerId: doc.ownerId,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt
  };
}

export class MongoCustomBotStore implements ICustomBotStore {
  async create(input: CustomAgentInput, ownerId: string): Promise<CustomAgent> {
    return withStore('custom bot create', async () => {
      const doc = await CustomBot.create({
        ownerId,
        name: input.name,
        emoji: input.emoji,
        category: input.category,
        description: input.description,
        systemPrompt: input.systemPrompt,
        temperature: input.temperature,
        specialties: [...input.specialties],
        quickActions: [...input.quickActions]
      });
      logger.info('[BOTS] Custom bot saved', { botId: doc.botId, ownerId });
      return toCustomAgent(doc);
    });
  }

  async list(ownerId: string): Promise<CustomAgent[]> {
    return withStore('custom bot list', async () => {
      const docs = await CustomBot.find({ ownerId })
        .sort({ createdAt: 1, botId: 1 })
        .lean<ICustomBot[]>()
        .exec();
      return docs.map(toCustomAgent);
    });
  }

  async get(id: string): Promise<CustomAgent | null> {
    return withStore('custom bot get', async () => {
      const doc = await CustomBot.findOne({ botId: id }).lean<ICustomBot>().exec();
      return doc ? toCustomAgent(doc) : null;
    });
  }

  async update(id: string, ownerId: string, fields: CustomAgentUpdate): Promise<CustomAgent> {
    return withStore('custom bot update', async () => {
      const doc = await CustomBot.findOne({ botId: id }).exec();
      if (!doc) {
        throw new UnknownAgentError(id);
      }
      if (doc.ownerId !== ownerId) {
        throw new NotOwnerError(id);
      }

      // An undefined value would unset the field in mongoose
      const changes: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(fields)) {
        if (value !== undefined) {
          changes[key] = value;
        }
      }
      doc.set(changes);
      await doc.save();
      return toCustomAgent(doc);
    });
  }

  async delete(id: string, ownerId: string): Promise<void> {
    await withStore('custom bot delete', async () => {
      const doc = await CustomBot.findOne({ botId: id }, { ownerId: 1 }).lean<Pick<ICustomBot, 'ownerId'>>().exec();
      if (!doc) {
        throw new UnknownAgentError(id);
      }
      if (doc.ownerId !== ownerId) {
        throw new NotOwnerError(id);
      }
      await CustomBot.deleteOne({ botId: id, ownerId }).exec();
      logger.info('[BOTS] Custom bot deleted', { botId: id, ownerId });
    });
  }

  async deleteAll(ownerId: string): Promise<string[]> {
    return withStore('custom bot delete all', async () => {
      const docs = await CustomBot.find({ ownerId }, { botId: 1 }).lean<Pick<ICustomBot, 'botId'>[]>().exec();
      const ids = docs.map(doc => doc.botId);
      if (ids.length > 0) {
        await CustomBot.deleteMany({ ownerId, botId: { $in: ids } }).exec();
      }
      return ids;
    });
  }
}
