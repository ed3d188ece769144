// src/services/chatService.ts
import { getModelInfo } from '../config/models.js';
import {
  ChatReply,
  ChatWarning,
  ContextBudget,
  ConversationTurn,
  SendMessageRequest
} from '../types/conversation.js';
import { CompletionClient, IHistoryStore } from '../types/services.js';
import { EmptyMessageError, UnknownQuickActionError } from '../utils/errorHandler.js';
import { logger, describeError } from '../utils/logger.js';
import { BotResolver, resolveAgent, resolveAgentOrDefault } from './botResolver.js';
import { buildMessages } from './promptAssembler.js';
import { buildHistoryExport, HistoryExport, HistoryExportFormat } from '../utils/historyExport.js';

export interface ChatSettings {
  defaultAgentId: string;
  defaultModel: string;
  maxCompletionTokens: number;
  contextTokenBudget?: number;
  maxHistoryTurns?: number;
}

export const QUICK_ACTION_PREFIX = 'Help me with: ';

function preview(text: string): string {
  return text.substring(0, 50) + (text.length > 50 ? '...' : '');
}

export class ChatService {
  constructor(
    private resolver: BotResolver,
    private historyStore: IHistoryStore,
    private completionClient: CompletionClient,
    private settings: ChatSettings,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * An explicit budget wins; otherwise the model's context window minus the
   * room reserved for the reply.
   */
  budgetFor(model: string): ContextBudget {
    const info = getModelInfo(model);
    const fromModel = info ? info.contextTokens - this.settings.maxCompletionTokens : undefined;
    return {
      maxContextTokens: this.settings.contextTokenBudget ?? fromModel,
      maxHistoryTurns: this.settings.maxHistoryTurns
    };
  }

  /**
   * Resolve the agent, assemble the prompt, call the model and record both turns.
   * Nothing is written to history unless the completion succeeded, and the two
   * turns are stored together or not at all.
   */
  async sendMessage(request: SendMessageRequest): Promise<ChatReply> {
    const content = request.message.trim();
    if (!content) {
      throw new EmptyMessageError();
    }

    const warnings = new Set<ChatWarning>();
    const receivedAt = this.now();

    const { catalog, storeUnavailable } = await this.resolver.resolveCatalogForUser(request.userId);
    if (storeUnavailable) {
      warnings.add('StoreUnavailable');
    }

    const { agent, fellBack } = resolveAgentOrDefault(catalog, request.agentId, this.settings.defaultAgentId);
    if (fellBack) {
      warnings.add('UnknownAgent');
      logger.warn('[CHAT] Requested agent not in catalog, using fallback', {
        requested: request.agentId,
        fallback: agent.id
      });
    }

    logger.info('[CHAT] Processing message', {
      userId: request.userId,
      agentId: agent.id,
      messagePreview: preview(content)
    });

    let history: ConversationTurn[] = [];
    try {
      history = await this.historyStore.read(request.userId, agent.id);
    } catch (error) {
      warnings.add('StoreUnavailable');
      logger.warn('[CHAT] History unavailable, continuing without it', { error: describeError(error) });
    }

    const model = request.model ?? this.settings.defaultModel;
    const messages = buildMessages(agent, history, content, this.budgetFor(model));
    logger.debug('[CHAT] Prompt assembled', {
      historyTurns: history.length,
      sentTurns: messages.length - 2
    });

    const reply = await this.completionClient.complete(messages, agent.temperature, model);

    try {
      await this.historyStore.appendExchange(request.userId, agent.id, [
        { role: 'user', content, timestamp: receivedAt },
        { role: 'assistant', content: reply, timestamp: this.now() }
      ]);
    } catch (error) {
      warnings.add('StoreUnavailable');
      logger.warn('[CHAT] Reply delivered but not saved to history', { error: describeError(error) });
    }

    return {
      reply,
      agentId: agent.id,
      agentName: agent.name,
      model,
      fellBack,
      warnings: [...warnings]
    };
  }

  /**
   * Quick actions are canned prompts listed on the agent itself
   */
  async runQuickAction(userId: string, agentId: string, action: string): Promise<ChatReply> {
    const { catalog } = await this.resolver.resolveCatalogForUser(userId);
    const agent = resolveAgent(catalog, agentId);

    if (!agent.quickActions.includes(action)) {
      throw new UnknownQuickActionError(agent.id, action);
    }

    return this.sendMessage({ userId, agentId: agent.id, message: `${QUICK_ACTION_PREFIX}${action}` });
  }

  async getHistory(userId: string, agentId: string, limit?: number): Promise<ConversationTurn[]> {
    return this.historyStore.read(userId, agentId, limit);
  }

  async exportHistory(userId: string, agentId: string, format: HistoryExportFormat): Promise<HistoryExport> {
    const turns = await this.historyStore.read(userId, agentId);
    logger.info('[CHAT] Exporting history', { userId, agentId, format, turns: turns.length });
    return buildHistoryExport(agentId, turns, format);
  }

  async clearHistory(userId: string, agentId: string): Promise<number> {
    const removed = await this.historyStore.clear(userId, agentId);
    logger.info('[CHAT] History cleared', { userId, agentId, removed });
    return removed;
  }
}
