import { z } from 'zod';
import { ValidationError } from '../utils/errorHandler.js';

export function parseInput<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
        throw new ValidationError('Invalid request', result.error.flatten());
    }
    return result.data;
}
