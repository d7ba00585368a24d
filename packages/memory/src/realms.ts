import { REALMS, type ActingIdentity, type Realm } from '@realmchat/shared'

// Higher wins. `satisfies` makes a missing or extra realm a compile error.
export const REALM_AUTHORITY = {
    CLIENT: 4,
    ACTOR: 3,
    ACTOR_CLASS: 2,
    SKILL_MODULE: 1,
} as const satisfies Record<Realm, number>

export const ALL_REALMS: readonly Realm[] = REALMS

export function outranks(a: Realm, b: Realm): boolean {
    return REALM_AUTHORITY[a] > REALM_AUTHORITY[b]
}

// Highest authority first
export function byAuthority(a: Realm, b: Realm): number {
    return REALM_AUTHORITY[b] - REALM_AUTHORITY[a]
}

export function emptyRealmCounts(): Record<Realm, number> {
    return { CLIENT: 0, ACTOR: 0, ACTOR_CLASS: 0, SKILL_MODULE: 0 }
}

/** The (realm, entity id) pairs an identity can be searched under. */
export function realmScopes(identity: ActingIdentity, realms: readonly Realm[]): Array<{ realm: Realm; entityId: string }> {
    const wanted = [...new Set(realms)].sort(byAuthority)
    return wanted.flatMap((realm): Array<{ realm: Realm; entityId: string }> => {
        switch (realm) {
            case 'CLIENT': return [{ realm, entityId: identity.clientId }]
            case 'ACTOR': return [{ realm, entityId: identity.actorId }]
            case 'ACTOR_CLASS': return [{ realm, entityId: identity.actorClassId }]
            case 'SKILL_MODULE': return [...new Set(identity.skillModuleIds)].map(entityId => ({ realm, entityId }))
        }
    })
}
