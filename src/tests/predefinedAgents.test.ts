import {
    buildPredefinedSystemPrompt,
    loadPredefinedAgents,
    PREDEFINED_AGENTS,
    PREDEFINED_AGENT_SEEDS
} from '../config/predefinedAgents.js';

describe('predefined agents', () => {
    it('loads every seed in declaration order with a unique id', () => {
        expect(PREDEFINED_AGENTS).toHaveLength(PREDEFINED_AGENT_SEEDS.length);
        expect(PREDEFINED_AGENTS.map(agent => agent.name)).toEqual(PREDEFINED_AGENT_SEEDS.map(seed => seed.name));
        expect(new Set(PREDEFINED_AGENTS.map(agent => agent.id)).size).toBe(PREDEFINED_AGENTS.length);
        expect(PREDEFINED_AGENTS[0].id).toBe('startup-strategist');
        expect(PREDEFINED_AGENTS.every(agent => !agent.isCustom)).toBe(true);
    });

    it('offers quick actions for every agent', () => {
        for (const agent of PREDEFINED_AGENTS) {
            expect(agent.quickActions.length).toBeGreaterThan(0);
        }
    });

    it('is frozen', () => {
        expect(Object.isFrozen(PREDEFINED_AGENTS)).toBe(true);
        expect(Object.isFrozen(PREDEFINED_AGENTS[0])).toBe(true);
        expect(Object.isFrozen(PREDEFINED_AGENTS[0].specialties)).toBe(true);
    });

    it('builds the system prompt from name, description and specialties', () => {
        const prompt = buildPredefinedSystemPrompt({
            name: 'Tea Sommelier',
            description: 'I pair teas with meals.',
            specialties: ['Oolong', 'Pairings']
        });

        expect(prompt.split('\n')).toEqual([
            'You are Tea Sommelier, I pair teas with meals.',
            '',
            'Your specialties include: Oolong, Pairings',
            '',
            'You should respond in a professional, helpful manner while staying true to your role and expertise.',
            'Provide actionable advice and insights based on your specialization.',
            'Be specific, practical, and focus on delivering value to business users.'
        ]);
    });

    it('suffixes ids when two seeds share a name', () => {
        const seed = {
            name: 'R&D Lead',
            emoji: '🔬',
            category: 'Research',
            description: 'd',
            temperature: 0.5,
            specialties: [],
            quickActions: []
        };

        expect(loadPredefinedAgents([seed, seed]).map(agent => agent.id)).toEqual(['r-and-d-lead', 'r-and-d-lead-1']);
    });
});
