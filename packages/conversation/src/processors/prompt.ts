import type { ConversationTurn } from '../schemas'
import type { ChatMessage } from '../types'

const HISTORY_TURNS_IN_PROMPT = 10

export function historyMessages(history: readonly ConversationTurn[], message: string): ChatMessage[] {
    const recent = history.slice(-HISTORY_TURNS_IN_PROMPT)
    return [
        ...recent.flatMap((turn): ChatMessage[] => [
            { role: 'user', content: turn.userMessage },
            ...(turn.response ? [{ role: 'assistant' as const, content: turn.response }] : []),
        ]),
        { role: 'user', content: message },
    ]
}

export function clip(text: string, max: number): string {
    const flat = text.trim().replace(/\s+/g, ' ')
    return flat.length > max ? `${flat.slice(0, max - 1).trimEnd()}…` : flat
}

export const DEGRADED_NOTE = 'Note: part of the knowledge base could not be reached for this turn. Answer from what is available and say so if it matters.'

export const MEMORY_UNAVAILABLE_NOTE = 'Note: the knowledge base is unavailable right now. Answer from the conversation so far and general knowledge, and be explicit about any uncertainty.'
