export interface ModelInfo {
    label: string;
    contextTokens: number;
}

export const SUPPORTED_MODELS: Readonly<Record<string, ModelInfo>> = {
    'gpt-4': { label: 'GPT-4', contextTokens: 8192 },
    'gpt-4-turbo': { label: 'GPT-4 Turbo', contextTokens: 128000 },
    'gpt-3.5-turbo': { label: 'GPT-3.5 Turbo', contextTokens: 4096 }
};

export function getModelInfo(model: string): ModelInfo | undefined {
    return Object.prototype.hasOwnProperty.call(SUPPORTED_MODELS, model) ? SUPPORTED_MODELS[model] : undefined;
}

export function isSupportedModel(model: string): boolean {
    return getModelInfo(model) !== undefined;
}
