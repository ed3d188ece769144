// src/controllers/botController.ts
import { Response } from 'express';
import { AuthenticatedRequest, requireUserId } from '../middleware/authMiddleware.js';
import { CustomBotService } from '../services/customBotService.js';
import { handleError } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';

export class BotController {
  constructor(private customBotService: CustomBotService) {}

  async listBots(req: AuthenticatedRequest, res: Response) {
    try {
      const bots = await this.customBotService.listBots(requireUserId(req));
      return res.status(200).json({ bots });
    } catch (error) {
      return handleError(res, error);
    }
  }

  async createBot(req: AuthenticatedRequest, res: Response) {
    try {
      const bot = await this.customBotService.createBot(requireUserId(req), req.body);
      logger.info('[API] Custom bot created', { botId: bot.id });
      return res.status(201).json({ bot });
    } catch (error) {
      return handleError(res, error);
    }
  }

  async updateBot(req: AuthenticatedRequest, res: Response) {
    try {
      const bot = await this.customBotService.updateBot(req.params.botId, requireUserId(req), req.body);
      return res.status(200).json({ bot });
    } catch (error) {
      return handleError(res, error);
    }
  }

  async deleteAllBots(req: AuthenticatedRequest, res: Response) {
    try {
      const deletedCount = await this.customBotService.deleteAllBots(requireUserId(req));
      return res.status(200).json({ message: 'All custom bots deleted', deletedCount });
    } catch (error) {
      return handleError(res, error);
    }
  }

  async deleteBot(req: AuthenticatedRequest, res: Response) {
    try {
      await this.customBotService.deleteBot(req.params.botId, requireUserId(req));
      return res.status(200).json({ message: 'Custom bot deleted successfully' });
    } catch (error) {
      return handleError(res, error);
    }
  }
}
