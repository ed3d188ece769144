import mongoose from "mongoose";
import { logger } from "../utils/logger.js";

export const connectDB = async (uri: string): Promise<void> => {
    logger.info('[DB] Attempting to connect to MongoDB...');

    try {
        const conn = await mongoose.connect(uri, {
            serverSelectionTimeoutMS: 5000, // Timeout after 5s instead of 30s
            socketTimeoutMS: 45000, // Close sockets after 45s of inactivity
        });

        if (!conn.connection.db) {
            throw new Error('Database connection not established');
        }
        logger.info('[DB] MongoDB connected', { database: conn.connection.db.databaseName });
    } catch (error) {
        logger.error('[DB] Error connecting to MongoDB', error);
        throw error;
    }
};

export const disconnectDB = async (): Promise<void> => {
    await mongoose.disconnect();
    logger.info('[DB] MongoDB disconnected');
};
