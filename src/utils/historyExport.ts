import { ConversationTurn } from '../types/conversation.js';

export type HistoryExportFormat = 'csv' | 'text';

export interface HistoryExport {
    filename: string;
    contentType: string;
    body: string;
}

const CSV_HEADER = 'timestamp,agentId,role,content';

function csvField(value: string): string {
    return `"${value.replace(/"/g, '""')}"`;
}

function formatHistoryCsv(agentId: string, turns: readonly ConversationTurn[]): string {
    const rows = turns.map(turn =>
        [turn.timestamp.toISOString(), agentId, turn.role, turn.content].map(csvField).join(',')
    );
    return [CSV_HEADER, ...rows].join('\n') + '\n';
}

// "User:" / "AI:" lines, with a separator after each reply
function formatHistoryText(turns: readonly ConversationTurn[]): string {
    const lines: string[] = [];
    for (const turn of turns) {
        if (turn.role === 'user') {
            lines.push(`User: ${turn.content}`);
        } else {
            lines.push(`AI: ${turn.content}`, '---');
        }
    }
    return lines.join('\n');
}

export function buildHistoryExport(
    agentId: string,
    turns: readonly ConversationTurn[],
    format: HistoryExportFormat
): HistoryExport {
    const safeId = agentId.replace(/[^a-zA-Z0-9_-]/g, '_');
    if (format === 'csv') {
        return {
            filename: `chat-history-${safeId}.csv`,
            contentType: 'text/csv; charset=utf-8',
            body: formatHistoryCsv(agentId, turns)
        };
    }
    return {
        filename: `chat-history-${safeId}.txt`,
        contentType: 'text/plain; charset=utf-8',
        body: formatHistoryText(turns)
    };
}
