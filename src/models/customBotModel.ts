import mongoose from 'mongoose';
import { randomUUID } from 'crypto';

export interface ICustomBot {
    botId: string;
    ownerId: string;
    name: string;
    emoji: string;
    category: string;
    description: string;
    systemPrompt: string;
    temperature: number;
    specialties: string[];
    quickActions: string[];
    createdAt: Date;
    updatedAt: Date;
}

export const customBotSchema = new mongoose.Schema<ICustomBot>({
    // Public id; never a predefined slug
    botId: { type: String, required: true, unique: true, default: () => randomUUID() },
    ownerId: { type: String, required: true },
    name: { type: String, required: true, trim: true, maxlength: 80 },
    emoji: { type: String, default: '🤖' },
    category: { type: String, required: true, trim: true, default: 'My Custom Bots' },
    description: { type: String, required: true, trim: true },
    systemPrompt: { type: String, required: true },
    temperature: { type: Number, required: true, min: 0, max: 2, default: 0.7 },
    specialties: { type: [String], default: [] },
    quickActions: { type: [String], default: [] }
}, {
    timestamps: true,
    collection: 'custom_bots'
});

customBotSchema.index({ ownerId: 1, createdAt: 1 });

const CustomBot = mongoose.model<ICustomBot>('CustomBot', customBotSchema);
export default CustomBot;
