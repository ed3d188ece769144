// src/services/usageService.ts
import { ICustomBotStore, IHistoryStore } from '../types/services.js';

export interface UsageStats {
  messagesSent: number;
  customBots: number;
  agentsUsed: number;
}

// Agents used are counted from stored conversations; clearing one drops its agent
export class UsageService {
  constructor(
    private historyStore: IHistoryStore,
    private customBotStore: ICustomBotStore
  ) {}

  async getStats(userId: string): Promise<UsageStats> {
    const [usage, bots] = await Promise.all([
      this.historyStore.usage(userId),
      this.customBotStore.list(userId)
    ]);

    return {
      messagesSent: usage.userMessages,
      customBots: bots.length,
      agentsUsed: usage.agentIds.length
    };
  }
}
