export type TurnRole = 'user' | 'assistant';

export type MessageRole = 'system' | TurnRole;

// One stored message of a conversation
export interface ConversationTurn {
    role: TurnRole;
    content: string;
    timestamp: Date;
}

// One element of the prompt sent to the completion API
export interface ChatMessage {
    role: MessageRole;
    content: string;
}

/**
 * Limits applied to history when assembling a prompt. The system prompt and
 * the new user message are always sent whatever the budget says.
 */
export interface ContextBudget {
    maxContextTokens?: number;
    maxHistoryTurns?: number;
}

export type ChatWarning = 'StoreUnavailable' | 'UnknownAgent';

export interface SendMessageRequest {
    userId: string;
    agentId: string;
    message: string;
    model?: string;
}

export interface ChatReply {
    reply: string;
    agentId: string;
    agentName: string;
    model: string;
    fellBack: boolean;
    warnings: ChatWarning[];
}
