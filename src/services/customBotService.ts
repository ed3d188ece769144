// src/services/customBotService.ts
import { CustomBotInputSchema, CustomBotUpdateSchema } from '../schemas/customBotSchema.js';
import { parseInput } from '../schemas/validate.js';
import { CustomAgent, PredefinedAgent } from '../types/agent.js';
import { ICustomBotStore, IHistoryStore } from '../types/services.js';
import { DuplicateAgentNameError } from '../utils/errorHandler.js';
import { logger, describeError } from '../utils/logger.js';

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

export class CustomBotService {
  constructor(
    private store: ICustomBotStore,
    private historyStore: IHistoryStore,
    private predefined: readonly PredefinedAgent[]
  ) {}

  async createBot(ownerId: string, rawInput: unknown): Promise<CustomAgent> {
    const input = parseInput(CustomBotInputSchema, rawInput);
    await this.assertNameAvailable(ownerId, input.name);

    logger.info('[BOTS] Creating custom bot', { ownerId, name: input.name });
    return this.store.create(input, ownerId);
  }

  async listBots(ownerId: string): Promise<CustomAgent[]> {
    return this.store.list(ownerId);
  }

  async updateBot(botId: string, ownerId: string, rawFields: unknown): Promise<CustomAgent> {
    const fields = parseInput(CustomBotUpdateSchema, rawFields);
    if (fields.name !== undefined) {
      await this.assertNameAvailable(ownerId, fields.name, botId);
    }

    logger.info('[BOTS] Updating custom bot', { ownerId, botId, fields: Object.keys(fields) });
    return this.store.update(botId, ownerId, fields);
  }

  /**
   * Remove the bot, then its conversation. A stale selection of the id in a
   * client resolves to UnknownAgent from here on.
   */
  async deleteBot(botId: string, ownerId: string): Promise<void> {
    await this.store.delete(botId, ownerId);

    try {
      const removed = await this.historyStore.clear(ownerId, botId);
      logger.info('[BOTS] Deleted custom bot', { ownerId, botId, removedTurns: removed });
    } catch (error) {
      logger.warn('[BOTS] Bot deleted but its history could not be cleared', {
        ownerId,
        botId,
        error: describeError(error)
      });
    }
  }

  async deleteAllBots(ownerId: string): Promise<number> {
    const ids = await this.store.deleteAll(ownerId);

    for (const botId of ids) {
      try {
        await this.historyStore.clear(ownerId, botId);
      } catch (error) {
        logger.warn('[BOTS] Bot deleted but its history could not be cleared', {
          ownerId,
          botId,
          error: describeError(error)
        });
      }
    }

    logger.info('[BOTS] Deleted all custom bots', { ownerId, count: ids.length });
    return ids.length;
  }

  private async assertNameAvailable(ownerId: string, name: string, exceptBotId?: string): Promise<void> {
    const wanted = normalizeName(name);

    if (this.predefined.some(agent => normalizeName(agent.name) === wanted)) {
      throw new DuplicateAgentNameError(name);
    }

    const owned = await this.store.list(ownerId);
    if (owned.some(bot => bot.id !== exceptBotId && normalizeName(bot.name) === wanted)) {
      throw new DuplicateAgentNameError(name);
    }
  }
}
