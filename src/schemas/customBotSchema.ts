import { z } from "zod";

// Accepts ["a", "b"] or the form-style "a, b"
const listField = z
    .union([z.array(z.string()), z.string()])
    .transform(value => (Array.isArray(value) ? value : value.split(',')))
    .transform(items => items.map(item => item.trim()).filter(item => item.length > 0));

const nameField = z.string().trim().min(1).max(80);
// Counted in graphemes: one family or flag emoji is several code units
const graphemes = new Intl.Segmenter(undefined, { granularity: 'grapheme' });
const MAX_EMOJI_GRAPHEMES = 4;

function countGraphemes(value: string): number {
    return Array.from(graphemes.segment(value)).length;
}

const emojiField = z
    .string()
    .trim()
    .max(64)
    .refine(value => countGraphemes(value) <= MAX_EMOJI_GRAPHEMES, {
        message: `Emoji must be at most ${MAX_EMOJI_GRAPHEMES} characters`
    });
const categoryField = z.string().trim().min(1).max(80);
const descriptionField = z.string().trim().min(1).max(1000);
// Kept verbatim: the prompt is sent to the model exactly as written
const systemPromptField = z
    .string()
    .max(20000)
    .refine(prompt => prompt.trim().length > 0, { message: 'System prompt must not be empty' });
const temperatureField = z.number().min(0).max(2);

export const CustomBotInputSchema = z.object({
    name: nameField,
    emoji: emojiField.default('🤖'),
    category: categoryField.default('My Custom Bots'),
    description: descriptionField,
    systemPrompt: systemPromptField,
    temperature: temperatureField.default(0.7),
    specialties: listField.default([]),
    quickActions: listField.default([])
});

export const CustomBotUpdateSchema = z
    .object({
        name: nameField.optional(),
        emoji: emojiField.optional(),
        category: categoryField.optional(),
        description: descriptionField.optional(),
        systemPrompt: systemPromptField.optional(),
        temperature: temperatureField.optional(),
        specialties: listField.optional(),
        quickActions: listField.optional()
    })
    .refine(fields => Object.values(fields).some(value => value !== undefined), {
        message: 'At least one field must be provided'
    });
