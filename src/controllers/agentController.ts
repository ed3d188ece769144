// src/controllers/agentController.ts
import { Response } from 'express';
import { AuthenticatedRequest } from '../middleware/authMiddleware.js';
import { BotResolver, groupByCategory, resolveAgent } from '../services/botResolver.js';
import { handleError } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';

export class AgentController {
  constructor(private botResolver: BotResolver) {}

  /**
   * Catalog for the caller in display order; anonymous callers get the predefined agents
   */
  async listAgents(req: AuthenticatedRequest, res: Response) {
    try {
      const userId = req.user?.id ?? null;
      const { catalog, storeUnavailable } = await this.botResolver.resolveCatalogForUser(userId);

      logger.info('[API] Listing agents', { userId, count: catalog.size, storeUnavailable });
      return res.status(200).json({ agents: [...catalog.values()], storeUnavailable });
    } catch (error) {
      logger.error('[API] Failed to list agents', error);
      return handleError(res, error);
    }
  }

  async listCategories(req: AuthenticatedRequest, res: Response) {
    try {
      const { catalog, storeUnavailable } = await this.botResolver.resolveCatalogForUser(req.user?.id ?? null);
      return res.status(200).json({ categories: groupByCategory(catalog), storeUnavailable });
    } catch (error) {
      logger.error('[API] Failed to list agent categories', error);
      return handleError(res, error);
    }
  }

  async getAgent(req: AuthenticatedRequest, res: Response) {
    try {
      const { catalog } = await this.botResolver.resolveCatalogForUser(req.user?.id ?? null);
      const agent = resolveAgent(catalog, req.params.agentId);
      return res.status(200).json({ agent });
    } catch (error) {
      return handleError(res, error);
    }
  }
}
