// src/services/botResolver.ts
import {
  AgentCategory,
  AgentDefinition,
  Catalog,
  CatalogResolution,
  CustomAgent,
  PredefinedAgent
} from '../types/agent.js';
import { ICustomBotStore } from '../types/services.js';
import { UnknownAgentError } from '../utils/errorHandler.js';
import { logger, describeError } from '../utils/logger.js';

/**
 * Creation order, oldest first. Ties fall back to the id so the order is total.
 */
export function compareByCreation(a: CustomAgent, b: CustomAgent): number {
  const byTime = a.createdAt.getTime() - b.createdAt.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Merge the predefined table with the custom agents a store returned.
 *
 * Only agents owned by `userId` are kept, so a store that returns too much can
 * never leak another user's bot. With no user only predefined agents are visible.
 */
export function resolveCatalog(
  predefined: readonly PredefinedAgent[],
  custom: readonly CustomAgent[],
  userId: string | null
): Catalog {
  const catalog = new Map<string, AgentDefinition>();

  for (const agent of predefined) {
    catalog.set(agent.id, agent);
  }

  if (!userId) {
    return catalog;
  }

  const owned = custom
    .filter(agent => agent.ownerId === userId)
    .sort(compareByCreation);

  for (const agent of owned) {
    if (catalog.has(agent.id)) {
      logger.warn('[RESOLVER] Custom agent id collides with an existing agent, skipping', {
        agentId: agent.id,
        userId
      });
      continue;
    }
    catalog.set(agent.id, agent);
  }

  return catalog;
}

export function resolveAgent(catalog: Catalog, agentId: string): AgentDefinition {
  const agent = catalog.get(agentId);
  if (!agent) {
    throw new UnknownAgentError(agentId);
  }
  return agent;
}

/**
 * Caller-side fallback for a stale selection: the default agent, or the first
 * agent of the catalog when the default itself is missing.
 */
export function resolveAgentOrDefault(
  catalog: Catalog,
  agentId: string,
  defaultAgentId: string
): { agent: AgentDefinition; fellBack: boolean } {
  try {
    return { agent: resolveAgent(catalog, agentId), fellBack: false };
  } catch (error) {
    if (!(error instanceof UnknownAgentError)) {
      throw error;
    }
  }

  let fallback = catalog.get(defaultAgentId);
  if (!fallback) {
    for (const agent of catalog.values()) {
      fallback = agent;
      break;
    }
  }
  if (!fallback) {
    throw new UnknownAgentError(agentId);
  }
  return { agent: fallback, fellBack: true };
}

export function groupByCategory(catalog: Catalog): AgentCategory[] {
  const groups = new Map<string, AgentDefinition[]>();

  for (const agent of catalog.values()) {
    const group = groups.get(agent.category);
    if (group) {
      group.push(agent);
    } else {
      groups.set(agent.category, [agent]);
    }
  }

  return [...groups.entries()].map(([category, agents]) => ({ category, agents }));
}

export class BotResolver {
  constructor(
    private customBotStore: ICustomBotStore,
    private predefined: readonly PredefinedAgent[]
  ) {}

  /**
   * Catalog for one user. A failing store does not fail the request: the
   * predefined agents are returned and `storeUnavailable` is set.
   */
  async resolveCatalogForUser(userId: string | null): Promise<CatalogResolution> {
    if (!userId) {
      return { catalog: resolveCatalog(this.predefined, [], null), storeUnavailable: false };
    }

    try {
      const custom = await this.customBotStore.list(userId);
      logger.debug('[RESOLVER] Loaded custom agents', { userId, count: custom.length });
      return { catalog: resolveCatalog(this.predefined, custom, userId), storeUnavailable: false };
    } catch (error) {
      logger.warn('[RESOLVER] Custom bot store unavailable, serving predefined agents only', {
        userId,
        error: describeError(error)
      });
      return { catalog: resolveCatalog(this.predefined, [], userId), storeUnavailable: true };
    }
  }
}
