// Fields shared by predefined and user-authored agents
export interface AgentProfile {
    name: string;
    emoji: string;
    category: string;
    description: string;
    systemPrompt: string;
    temperature: number;
    specialties: readonly string[];
    quickActions: readonly string[];
}

export interface PredefinedAgent extends AgentProfile {
    id: string;
    isCustom: false;
}

export interface CustomAgent extends AgentProfile {
    id: string;
    isCustom: true;
    ownerId: string;
    createdAt: Date;
    updatedAt: Date;
}

export type AgentDefinition = PredefinedAgent | CustomAgent;

export type CustomAgentInput = AgentProfile;

export type CustomAgentUpdate = Partial<AgentProfile>;

/**
 * Agents visible to one user, keyed by id. Iteration order is display order:
 * predefined agents in declaration order, then custom agents oldest first.
 */
export type Catalog = ReadonlyMap<string, AgentDefinition>;

export interface CatalogResolution {
    catalog: Catalog;
    storeUnavailable: boolean;
}

export interface AgentCategory {
    category: string;
    agents: AgentDefinition[];
}
