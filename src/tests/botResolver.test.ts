import { PREDEFINED_AGENTS } from '../config/predefinedAgents.js';
import {
    BotResolver,
    groupByCategory,
    resolveAgent,
    resolveAgentOrDefault,
    resolveCatalog
} from '../services/botResolver.js';
import { InMemoryCustomBotStore } from '../services/inMemoryStores.js';
import { CustomAgent, PredefinedAgent } from '../types/agent.js';
import { ICustomBotStore } from '../types/services.js';
import { StoreUnavailableError, UnknownAgentError } from '../utils/errorHandler.js';
import { pirateBot } from './chatTestData.js';

function predefined(id: string, category: string): PredefinedAgent {
    return {
        id,
        name: id,
        emoji: '',
        category,
        description: `${id} agent`,
        systemPrompt: `You are ${id}.`,
        temperature: 0.5,
        specialties: [],
        quickActions: [],
        isCustom: false
    };
}

function custom(id: string, ownerId: string, createdAt: string, category: string = 'My Custom Bots'): CustomAgent {
    return {
        ...predefined(id, category),
        isCustom: true,
        ownerId,
        createdAt: new Date(createdAt),
        updatedAt: new Date(createdAt)
    };
}

const table = [predefined('alpha', 'Strategy'), predefined('beta', 'Finance'), predefined('gamma', 'Strategy')];

describe('resolveCatalog', () => {
    it('lists predefined agents in declaration order, then custom agents oldest first', () => {
        const catalog = resolveCatalog(table, [
            custom('c-late', 'u1', '2024-02-01T00:00:00Z'),
            custom('c-early', 'u1', '2024-01-01T00:00:00Z')
        ], 'u1');

        expect([...catalog.keys()]).toEqual(['alpha', 'beta', 'gamma', 'c-early', 'c-late']);
    });

    it('breaks creation time ties by id', () => {
        const catalog = resolveCatalog([], [
            custom('b-bot', 'u1', '2024-01-01T00:00:00Z'),
            custom('a-bot', 'u1', '2024-01-01T00:00:00Z')
        ], 'u1');

        expect([...catalog.keys()]).toEqual(['a-bot', 'b-bot']);
    });

    it('hides bots owned by other users', () => {
        const catalog = resolveCatalog(table, [
            custom('mine', 'u1', '2024-01-01T00:00:00Z'),
            custom('theirs', 'u2', '2024-01-01T00:00:00Z')
        ], 'u1');

        expect(catalog.has('mine')).toBe(true);
        expect(catalog.has('theirs')).toBe(false);
    });

    it('shows only predefined agents to anonymous callers', () => {
        const catalog = resolveCatalog(table, [custom('mine', 'u1', '2024-01-01T00:00:00Z')], null);
        expect([...catalog.keys()]).toEqual(['alpha', 'beta', 'gamma']);
    });

    it('keeps the predefined agent when a custom id collides with it', () => {
        const catalog = resolveCatalog(table, [custom('beta', 'u1', '2024-01-01T00:00:00Z')], 'u1');

        expect(catalog.size).toBe(3);
        expect(catalog.get('beta')?.isCustom).toBe(false);
    });
});

describe('resolveAgent', () => {
    const catalog = resolveCatalog(table, [], null);

    it('returns the agent for a known id', () => {
        expect(resolveAgent(catalog, 'beta').name).toBe('beta');
    });

    it('throws UnknownAgentError for an unknown id', () => {
        expect(() => resolveAgent(catalog, 'missing')).toThrow(UnknownAgentError);
    });
});

describe('resolveAgentOrDefault', () => {
    const catalog = resolveCatalog(table, [], null);

    it('does not fall back when the agent exists', () => {
        const result = resolveAgentOrDefault(catalog, 'gamma', 'alpha');
        expect(result.agent.id).toBe('gamma');
        expect(result.fellBack).toBe(false);
    });

    it('falls back to the default agent', () => {
        const result = resolveAgentOrDefault(catalog, 'deleted-bot', 'beta');
        expect(result.agent.id).toBe('beta');
        expect(result.fellBack).toBe(true);
    });

    it('falls back to the first agent when the default is missing too', () => {
        const result = resolveAgentOrDefault(catalog, 'deleted-bot', 'also-missing');
        expect(result.agent.id).toBe('alpha');
        expect(result.fellBack).toBe(true);
    });

    it('throws when the catalog is empty', () => {
        expect(() => resolveAgentOrDefault(new Map(), 'any', 'alpha')).toThrow(UnknownAgentError);
    });
});

describe('groupByCategory', () => {
    it('groups agents by category in first-seen order', () => {
        const groups = groupByCategory(resolveCatalog(table, [], null));

        expect(groups.map(group => group.category)).toEqual(['Strategy', 'Finance']);
        expect(groups[0].agents.map(agent => agent.id)).toEqual(['alpha', 'gamma']);
        expect(groups[1].agents.map(agent => agent.id)).toEqual(['beta']);
    });
});

describe('BotResolver', () => {
    it('merges the user\'s stored bots into the catalog', async () => {
        const store = new InMemoryCustomBotStore(() => new Date('2024-01-01T00:00:00Z'), () => 'bot-1');
        await store.create(pirateBot, 'u1');
        const resolver = new BotResolver(store, PREDEFINED_AGENTS);

        const { catalog, storeUnavailable } = await resolver.resolveCatalogForUser('u1');

        expect(storeUnavailable).toBe(false);
        expect(catalog.size).toBe(PREDEFINED_AGENTS.length + 1);
        expect([...catalog.keys()].pop()).toBe('bot-1');
    });

    it('serves predefined agents and flags the store when it fails', async () => {
        const failing: ICustomBotStore = {
            create: async () => { throw new StoreUnavailableError('custom bot create'); },
            list: async () => { throw new StoreUnavailableError('custom bot list'); },
            get: async () => { throw new StoreUnavailableError('custom bot get'); },
            update: async () => { throw new StoreUnavailableError('custom bot update'); },
            delete: async () => { throw new StoreUnavailableError('custom bot delete'); },
            deleteAll: async () => { throw new StoreUnavailableError('custom bot delete all'); }
        };
        const resolver = new BotResolver(failing, PREDEFINED_AGENTS);

        const { catalog, storeUnavailable } = await resolver.resolveCatalogForUser('u1');

        expect(storeUnavailable).toBe(true);
        expect([...catalog.keys()]).toEqual(PREDEFINED_AGENTS.map(agent => agent.id));
    });

    it('does not touch the store for anonymous callers', async () => {
        const store = new InMemoryCustomBotStore();
        const list = jest.spyOn(store, 'list');
        const resolver = new BotResolver(store, PREDEFINED_AGENTS);

        const { catalog } = await resolver.resolveCatalogForUser(null);

        expect(list).not.toHaveBeenCalled();
        expect(catalog.size).toBe(PREDEFINED_AGENTS.length);
    });
});
