import mongoose from 'mongoose';
import ChatTurn from '../models/chatTurnModel.js';
import CustomBot from '../models/customBotModel.js';
import { toCustomAgent } from '../services/customBotStore.js';
import { generateSlug } from '../utils/slugUtils.js';
import { withStore } from '../utils/withStore.js';
import { NotOwnerError, StoreUnavailableError, ValidationError } from '../utils/errorHandler.js';

describe('withStore', () => {
    it('returns the result of the operation', async () => {
        await expect(withStore('lookup', async () => 42)).resolves.toBe(42);
    });

    it('lets domain errors through unchanged', async () => {
        const error = new NotOwnerError('bot-1');
        await expect(withStore('update', async () => { throw error; })).rejects.toBe(error);
    });

    it('turns schema validation failures into ValidationError', async () => {
        await expect(
            withStore('create', async () => { throw new mongoose.Error.ValidationError(); })
        ).rejects.toBeInstanceOf(ValidationError);
    });

    it('reports driver failures as StoreUnavailable', async () => {
        await expect(
            withStore('custom bot list', async () => { throw new Error('connection refused'); })
        ).rejects.toMatchObject({ statusCode: 503, code: 'StoreUnavailable', details: { operation: 'custom bot list' } });
        await expect(
            withStore('custom bot list', async () => { throw new Error('connection refused'); })
        ).rejects.toBeInstanceOf(StoreUnavailableError);
    });
});

describe('CustomBot model', () => {
    it('fills in defaults and a public id', () => {
        const doc = new CustomBot({
            ownerId: 'u1',
            name: 'Helper',
            description: 'Helps.',
            systemPrompt: 'You help.'
        });

        expect(doc.validateSync()).toBeFalsy();
        expect(doc.botId).toMatch(/^[0-9a-f-]{36}$/);
        expect(doc.emoji).toBe('🤖');
        expect(doc.category).toBe('My Custom Bots');
        expect(doc.temperature).toBe(0.7);
    });

    it('rejects a temperature out of range', () => {
        const doc = new CustomBot({
            ownerId: 'u1',
            name: 'Helper',
            description: 'Helps.',
            systemPrompt: 'You help.',
            temperature: 5
        });

        expect(doc.validateSync()?.errors.temperature).toBeDefined();
    });

    it('maps to a custom agent', () => {
        const at = new Date('2024-01-01T00:00:00Z');
        const agent = toCustomAgent({
            botId: 'bot-1',
            ownerId: 'u1',
            name: 'Helper',
            emoji: '🤖',
            category: 'My Custom Bots',
            description: 'Helps.',
            systemPrompt: 'You help.',
            temperature: 0.7,
            specialties: ['Listening'],
            quickActions: [],
            createdAt: at,
            updatedAt: at
        });

        expect(agent).toMatchObject({ id: 'bot-1', isCustom: true, ownerId: 'u1', specialties: ['Listening'] });
    });
});

describe('ChatTurn model', () => {
    it('only accepts user and assistant roles', () => {
        const doc = new ChatTurn({ userId: 'u1', agentId: 'a', role: 'system', content: 'x' });
        expect(doc.validateSync()?.errors.role).toBeDefined();
    });
});

describe('generateSlug', () => {
    it('builds a url-safe id and avoids taken ones', () => {
        expect(generateSlug('Sales & Marketing Pro!', new Set())).toBe('sales-and-marketing-pro');
        expect(generateSlug('Helper', new Set(['helper', 'helper-1']))).toBe('helper-2');
    });
});
