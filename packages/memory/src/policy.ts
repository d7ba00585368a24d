import type { ResolvedMemoryEntry } from './types'

export const POLICY_MARKERS = ['policy', 'rule', 'requirement'] as const

/** A CLIENT policy binds every answer it applies to, whatever it scored. */
export function isBindingPolicy(entry: Pick<ResolvedMemoryEntry, 'realm' | 'entityType' | 'factType'>): boolean {
    if (entry.realm !== 'CLIENT') return false
    const type = `${entry.entityType} ${entry.factType ?? ''}`.toLowerCase()
    return POLICY_MARKERS.some(marker => type.includes(marker))
}
