// src/controllers/chatController.ts
import { Response } from "express";
import { AuthenticatedRequest, requireUserId } from '../middleware/authMiddleware.js';
import {
  HistoryExportQuerySchema,
  HistoryQuerySchema,
  QuickActionSchema,
  SendMessageSchema
} from '../schemas/requestSchemas.js';
import { parseInput } from '../schemas/validate.js';
import { ChatService } from '../services/chatService.js';
import { handleError } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';

export class ChatController {
  constructor(private chatService: ChatService) {}

  /**
   * Send a message to an agent
   */
  async sendMessage(req: AuthenticatedRequest, res: Response) {
    try {
      const userId = requireUserId(req);
      const { agentId, message, model } = parseInput(SendMessageSchema, req.body);

      const result = await this.chatService.sendMessage({ userId, agentId, message, model });
      return res.status(200).json(result);
    } catch (error) {
      logger.error('[API] Failed to process message', error);
      return handleError(res, error);
    }
  }

  async runQuickAction(req: AuthenticatedRequest, res: Response) {
    try {
      const userId = requireUserId(req);
      const { agentId, action } = parseInput(QuickActionSchema, req.body);

      const result = await this.chatService.runQuickAction(userId, agentId, action);
      return res.status(200).json(result);
    } catch (error) {
      logger.error('[API] Failed to run quick action', error);
      return handleError(res, error);
    }
  }

  /**
   * Turns with one agent, oldest first; `?limit=` keeps only the newest ones
   */
  async getHistory(req: AuthenticatedRequest, res: Response) {
    try {
      const userId = requireUserId(req);
      const { agentId } = req.params;
      const { limit } = parseInput(HistoryQuerySchema, req.query);

      const turns = await this.chatService.getHistory(userId, agentId, limit);
      return res.status(200).json({ agentId, turns });
    } catch (error) {
      return handleError(res, error);
    }
  }

  async exportHistory(req: AuthenticatedRequest, res: Response) {
    try {
      const userId = requireUserId(req);
      const { agentId } = req.params;
      const { format } = parseInput(HistoryExportQuerySchema, req.query);

      const file = await this.chatService.exportHistory(userId, agentId, format);
      res.setHeader('Content-Type', file.contentType);
      res.setHeader('Content-Disposition', `attachment; filename="${file.filename}"`);
      return res.status(200).send(file.body);
    } catch (error) {
      return handleError(res, error);
    }
  }

  async clearHistory(req: AuthenticatedRequest, res: Response) {
    try {
      const userId = requireUserId(req);
      const { agentId } = req.params;

      const deletedCount = await this.chatService.clearHistory(userId, agentId);
      return res.status(200).json({ message: 'Chat history cleared', deletedCount });
    } catch (error) {
      return handleError(res, error);
    }
  }
}
