import { APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { ChatCompletionsApi, OpenAICompletionClient, toCompletionError } from '../services/aiService.js';
import { CompletionError } from '../utils/errorHandler.js';

function apiError(status: number, code?: string): APIError {
    return APIError.generate(status, { error: { message: 'upstream said no', code } }, 'upstream said no', {});
}

describe('toCompletionError', () => {
    it.each([
        [401, undefined, 'AuthError'],
        [403, undefined, 'AuthError'],
        [429, undefined, 'RateLimited'],
        [404, undefined, 'UnsupportedModel'],
        [400, 'model_not_found', 'UnsupportedModel'],
        [500, undefined, 'TransientNetworkError'],
        [503, undefined, 'TransientNetworkError'],
        [400, undefined, 'UnknownError']
    ])('maps HTTP %s (code %s) to %s', (status, code, kind) => {
        expect(toCompletionError(apiError(status, code)).kind).toBe(kind);
    });

    it('treats timeouts and connection failures as transient', () => {
        expect(toCompletionError(new APIConnectionTimeoutError()).kind).toBe('TransientNetworkError');
        expect(toCompletionError(new APIConnectionError({ message: 'socket hang up' })).kind).toBe('TransientNetworkError');
    });

    it('passes completion errors through', () => {
        const original = new CompletionError('RateLimited', 'slow down');
        expect(toCompletionError(original)).toBe(original);
    });

    it('wraps anything else as UnknownError', () => {
        const mapped = toCompletionError(new Error('boom'));
        expect(mapped.kind).toBe('UnknownError');
        expect(mapped.message).toBe('boom');
        expect(toCompletionError('weird').message).toBe('Unknown error');
    });

    it('gives each kind its HTTP status', () => {
        expect(new CompletionError('AuthError', 'x').statusCode).toBe(502);
        expect(new CompletionError('RateLimited', 'x').statusCode).toBe(429);
        expect(new CompletionError('UnsupportedModel', 'x').statusCode).toBe(400);
        expect(new CompletionError('TransientNetworkError', 'x').statusCode).toBe(504);
        expect(new CompletionError('UnknownError', 'x').statusCode).toBe(502);
    });
});

describe('OpenAICompletionClient', () => {
    const messages = [{ role: 'user' as const, content: 'hello' }];

    it('rejects an unsupported model without calling the API', async () => {
        const client = new OpenAICompletionClient({ apiKey: 'test-key', timeoutMs: 1000, maxCompletionTokens: 100 });

        await expect(client.complete(messages, 0.7, 'gpt-2')).rejects.toMatchObject({ kind: 'UnsupportedModel' });
    });

    it('fails with AuthError when no API key is configured', async () => {
        const client = new OpenAICompletionClient({ timeoutMs: 1000, maxCompletionTokens: 100 });

        await expect(client.complete(messages, 0.7, 'gpt-4')).rejects.toMatchObject({ kind: 'AuthError', statusCode: 502 });
    });
});

function completion(content: string | null): ChatCompletion {
    return {
        id: 'chatcmpl-test',
        object: 'chat.completion',
        created: 1700000000,
        model: 'gpt-4',
        choices: [{
            index: 0,
            finish_reason: 'stop',
            logprobs: null,
            message: { role: 'assistant', content, refusal: null }
        }]
    };
}

class StubCompletions implements ChatCompletionsApi {
    requests: ChatCompletionCreateParamsNonStreaming[] = [];

    constructor(private respond: () => Promise<ChatCompletion>) {}

    async create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion> {
        this.requests.push(body);
        return this.respond();
    }
}

describe('OpenAICompletionClient requests', () => {
    const options = { timeoutMs: 1000, maxCompletionTokens: 321 };

    it('returns the reply and sends model, temperature, token limit and messages', async () => {
        const completions = new StubCompletions(async () => completion('Ship the smallest version first.'));
        const client = new OpenAICompletionClient({ ...options, completions });

        const reply = await client.complete(
            [
                { role: 'system', content: 'You are concise.' },
                { role: 'user', content: 'hi' },
                { role: 'assistant', content: 'hello' },
                { role: 'user', content: 'What next?' }
            ],
            0.4,
            'gpt-4-turbo'
        );

        expect(reply).toBe('Ship the smallest version first.');
        expect(completions.requests).toEqual([{
            model: 'gpt-4-turbo',
            temperature: 0.4,
            max_tokens: 321,
            messages: [
                { role: 'system', content: 'You are concise.' },
                { role: 'user', content: 'hi' },
                { role: 'assistant', content: 'hello' },
                { role: 'user', content: 'What next?' }
            ]
        }]);
    });

    it.each([
        ['whitespace', '  \n '],
        ['null', null]
    ])('fails with UnknownError on a %s reply', async (_label, content) => {
        const client = new OpenAICompletionClient({
            ...options,
            completions: new StubCompletions(async () => completion(content))
        });

        await expect(client.complete([{ role: 'user', content: 'hi' }], 0.7, 'gpt-4'))
            .rejects.toMatchObject({ kind: 'UnknownError', message: 'The language model returned an empty response' });
    });

    it('maps an API rate limit to RateLimited', async () => {
        const client = new OpenAICompletionClient({
            ...options,
            completions: new StubCompletions(async () => { throw apiError(429); })
        });

        await expect(client.complete([{ role: 'user', content: 'hi' }], 0.7, 'gpt-4'))
            .rejects.toMatchObject({ kind: 'RateLimited', statusCode: 429 });
    });

    it('maps a dropped connection to TransientNetworkError', async () => {
        const client = new OpenAICompletionClient({
            ...options,
            completions: new StubCompletions(async () => { throw new APIConnectionError({ message: 'socket hang up' }); })
        });

        await expect(client.complete([{ role: 'user', content: 'hi' }], 0.7, 'gpt-4'))
            .rejects.toMatchObject({ kind: 'TransientNetworkError', statusCode: 504 });
    });
});
