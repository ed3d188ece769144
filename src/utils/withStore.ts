import mongoose from 'mongoose';
import { AppError, StoreUnavailableError, ValidationError } from './errorHandler.js';
import { logger } from './logger.js';

/**
 * Run a database operation, letting domain errors through and turning driver
 * failures into StoreUnavailableError.
 */
export async function withStore<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
        return await run();
    } catch (error) {
        if (error instanceof AppError) {
            throw error;
        }
        if (error instanceof mongoose.Error.ValidationError) {
            throw new ValidationError(error.message);
        }
        logger.error(`[STORE] ${operation} failed`, error);
        throw new StoreUnavailableError(operation);
    }
}
