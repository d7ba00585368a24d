import { describe, expect, it } from 'vitest'
import type { Realm } from '@realmchat/shared'
import { mergeByPrecedence } from '../merge'
import { semanticKey, toResolvedEntry } from '../semantic-key'

function entry(id: string, realm: Realm, entityName: string, score: number, entityType = 'policy') {
    return toResolvedEntry({ id, entityName, entityType, content: id, score }, realm)
}

describe('semanticKey', () => {
    it('normalizes case, spacing and punctuation', () => {
        expect(semanticKey({ entityName: '  Vacation   Policy!', entityType: 'Policy' })).toBe('vacation-policy::policy')
    })

    it('prefers the fact type over the entity type', () => {
        expect(semanticKey({ entityName: 'User name', entityType: 'learned_fact', factType: 'identity' })).toBe('user-name::identity')
    })

    it('falls back to "fact" when the type normalizes to nothing', () => {
        expect(semanticKey({ entityName: 'Thing', entityType: '***' })).toBe('thing::fact')
    })
})

describe('mergeByPrecedence', () => {
    it('keeps the highest-authority realm even when a lower one scores better', () => {
        const merged = mergeByPrecedence([
            entry('skill', 'SKILL_MODULE', 'Dress code', 0.95),
            entry('class', 'ACTOR_CLASS', 'dress code', 0.9),
            entry('actor', 'ACTOR', 'Dress Code', 0.2),
        ], 10)

        expect(merged.map(e => e.id)).toEqual(['actor'])
    })

    it('within one realm keeps the better score, then the smaller id', () => {
        const merged = mergeByPrecedence([
            entry('b', 'CLIENT', 'Travel', 0.5),
            entry('a', 'CLIENT', 'travel', 0.5),
            entry('c', 'CLIENT', 'TRAVEL', 0.4),
        ], 10)

        expect(merged.map(e => e.id)).toEqual(['a'])
    })

    it('does not depend on input order', () => {
        const entries = [
            entry('x', 'ACTOR', 'Alpha', 0.3),
            entry('y', 'CLIENT', 'Beta', 0.3),
            entry('z', 'SKILL_MODULE', 'alpha', 0.9),
        ]
        const forward = mergeByPrecedence(entries, 10).map(e => e.id)
        const backward = mergeByPrecedence([...entries].reverse(), 10).map(e => e.id)

        expect(forward).toEqual(['y', 'x'])
        expect(backward).toEqual(forward)
    })

    it('keeps a low-scoring client policy that the limit would otherwise cut', () => {
        const merged = mergeByPrecedence([
            entry('s1', 'SKILL_MODULE', 'Laptop setup', 0.9, 'procedure'),
            entry('s2', 'SKILL_MODULE', 'Printer setup', 0.8, 'procedure'),
            entry('a1', 'ACTOR', 'Last ticket', 0.7, 'outcome'),
            entry('c1', 'CLIENT', 'Refund Policy', 0.1),
            entry('c2', 'CLIENT', 'Office map', 0.05, 'reference'),
        ], 3)

        expect(merged.map(e => e.id)).toEqual(['s1', 's2', 'c1'])
    })

    it('returns nothing for a non-positive limit', () => {
        expect(mergeByPrecedence([entry('a', 'CLIENT', 'A', 1)], 0)).toEqual([])
    })
})
