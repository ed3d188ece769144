// src/utils/errorHandler.ts
import { Response } from 'express';

export class AppError extends Error {
  constructor(
    public message: string,
    public statusCode: number = 500,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class UnknownAgentError extends AppError {
  constructor(public readonly agentId: string) {
    super(`Agent "${agentId}" not found`, 404, 'UnknownAgent', { agentId });
  }
}

export class EmptyMessageError extends AppError {
  constructor() {
    super('Message must not be empty', 400, 'EmptyMessage');
  }
}

export class StoreUnavailableError extends AppError {
  constructor(operation: string) {
    super(`Storage is unavailable (${operation})`, 503, 'StoreUnavailable', { operation });
  }
}

export class NotOwnerError extends AppError {
  constructor(agentId: string) {
    super('You can only change bots you created', 403, 'NotOwner', { agentId });
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'ValidationError', details);
  }
}

export class DuplicateAgentNameError extends AppError {
  constructor(name: string) {
    super(`A bot named "${name}" already exists`, 409, 'DuplicateAgentName', { name });
  }
}

export class UnknownQuickActionError extends AppError {
  constructor(agentId: string, action: string) {
    super(`"${action}" is not a quick action of this agent`, 400, 'UnknownQuickAction', { agentId, action });
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Not authorized') {
    super(message, 401, 'Unauthorized');
  }
}

export type CompletionErrorKind =
  | 'AuthError'
  | 'RateLimited'
  | 'UnsupportedModel'
  | 'TransientNetworkError'
  | 'UnknownError';

const COMPLETION_STATUS: Record<CompletionErrorKind, number> = {
  AuthError: 502,
  RateLimited: 429,
  UnsupportedModel: 400,
  TransientNetworkError: 504,
  UnknownError: 502
};

// Failures of the language model call; never retried inside the service
export class CompletionError extends AppError {
  constructor(public readonly kind: CompletionErrorKind, message: string) {
    super(message, COMPLETION_STATUS[kind], kind);
  }
}

export const handleError = (res: Response, error: unknown) => {
  if (error instanceof AppError) {
    return res.status(error.statusCode).json({ 
      error: error.message,
      code: error.code,
      details: error.details
    });
  }
  
  const message = error instanceof Error ? error.message : 'Unknown error';
  return res.status(500).json({ error: message });
};
