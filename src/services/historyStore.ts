// src/services/historyStore.ts
import { randomUUID } from 'crypto';
import ChatTurn, { IChatTurn } from '../models/chatTurnModel.js';
import { ConversationTurn } from '../types/conversation.js';
import { HistoryUsage, IHistoryStore } from '../types/services.js';
import { logger } from '../utils/logger.js';
import { withStore } from '../utils/withStore.js';

function toTurn(doc: IChatTurn): ConversationTurn {
  return { role: doc.role, content: doc.content, timestamp: doc.timestamp };
}

export class MongoHistoryStore implements IHistoryStore {
  async append(userId: string, agentId: string, turn: ConversationTurn): Promise<void> {
    await withStore('history append', async () => {
      await ChatTurn.create({
        userId,
        agentId,
        role: turn.role,
        content: turn.content,
        timestamp: turn.timestamp
      });
    });
  }

  async appendExchange(userId: string, agentId: string, turns: readonly ConversationTurn[]): Promise<void> {
    await withStore('history append', async () => {
      const exchangeId = randomUUID();
      try {
        await ChatTurn.insertMany(
          turns.map(turn => ({
            userId,
            agentId,
            exchangeId,
            role: turn.role,
            content: turn.content,
            timestamp: turn.timestamp
          })),
          { ordered: true }
        );
      } catch (error) {
        // Remove whatever part of the exchange made it in before the failure
        try {
          await ChatTurn.deleteMany({ exchangeId }).exec();
        } catch (cleanupError) {
          logger.error(`[HISTORY] Could not remove partly written exchange ${exchangeId}`, cleanupError);
        }
        throw error;
      }
    });
  }

  async read(userId: string, agentId: string, limit?: number): Promise<ConversationTurn[]> {
    return withStore('history read', async () => {
      if (limit === undefined) {
        const turns = await ChatTurn.find({ userId, agentId })
          .sort({ timestamp: 1, _id: 1 })
          .lean<IChatTurn[]>()
          .exec();
        return turns.map(toTurn);
      }

      const newest = await ChatTurn.find({ userId, agentId })
        .sort({ timestamp: -1, _id: -1 })
        .limit(limit)
        .lean<IChatTurn[]>()
        .exec();
      return newest.reverse().map(toTurn);
    });
  }

  async usage(userId: string): Promise<HistoryUsage> {
    return withStore('history usage', async () => {
      const [userMessages, agentIds] = await Promise.all([
        ChatTurn.countDocuments({ userId, role: 'user' }).exec(),
        ChatTurn.distinct('agentId', { userId }).exec()
      ]);
      return { userMessages, agentIds: [...agentIds].sort() };
    });
  }

  async clear(userId: string, agentId: string): Promise<number> {
    return withStore('history clear', async () => {
      const result = await ChatTurn.deleteMany({ userId, agentId }).exec();
      return result.deletedCount;
    });
  }
}
