import type { Realm } from '@realmchat/shared'
import type { ResolvedMemoryEntry } from './types'

const REALM_LABEL: Record<Realm, string> = {
    CLIENT: 'organisation',
    ACTOR: 'own experience',
    ACTOR_CLASS: 'role knowledge',
    SKILL_MODULE: 'skill module',
}

export function describeEntry(entry: ResolvedMemoryEntry): string {
    return `[${REALM_LABEL[entry.realm]} | relevance:${entry.score.toFixed(2)}] ${entry.entityName}: ${entry.content.slice(0, 400)}`
}

export function buildMemoryContext(
    entries: readonly ResolvedMemoryEntry[],
    options: { heading: string; limit?: number; emptyText?: string },
): string {
    const shown = entries.slice(0, options.limit ?? 8)
    if (shown.length === 0) {
        return `## ${options.heading}\n${options.emptyText ?? 'No specific knowledge available.'}`
    }
    return `## ${options.heading}\n${shown.map(describeEntry).join('\n')}`
}
