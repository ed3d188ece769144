import { z } from "zod";

// Emptiness of `message` is checked by the chat service, after trimming
export const SendMessageSchema = z.object({
    agentId: z.string().min(1),
    message: z.string(),
    model: z.string().min(1).optional()
});

export const QuickActionSchema = z.object({
    agentId: z.string().min(1),
    action: z.string().trim().min(1)
});

export const RegisterSchema = z.object({
    email: z.string().trim().toLowerCase().email(),
    password: z.string().min(8),
    name: z.string().trim().min(1).max(100)
});

export const LoginSchema = z.object({
    email: z.string().trim().toLowerCase().email(),
    password: z.string().min(1)
});

// Query strings arrive as text
export const HistoryQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(500).optional()
});

export const HistoryExportQuerySchema = z.object({
    format: z.enum(['csv', 'text']).default('csv')
});
