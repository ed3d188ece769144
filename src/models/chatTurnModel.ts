import mongoose from 'mongoose';
import { TurnRole } from '../types/conversation.js';

// One document per turn, so an append is a single insert
export interface IChatTurn {
    userId: string;
    agentId: string;
    role: TurnRole;
    content: string;
    timestamp: Date;
    // Shared by the turns written together by one chat request
    exchangeId?: string;
}

export const chatTurnSchema = new mongoose.Schema<IChatTurn>({
    userId: { type: String, required: true },
    agentId: { type: String, required: true },
    role: {
        type: String,
        required: true,
        enum: ['user', 'assistant']
    },
    content: { type: String, required: true },
    timestamp: { type: Date, default: Date.now },
    exchangeId: { type: String }
}, {
    collection: 'chat_turns'
});

chatTurnSchema.index({ userId: 1, agentId: 1, timestamp: 1 });

const ChatTurn = mongoose.model<IChatTurn>('ChatTurn', chatTurnSchema);
export default ChatTurn;
