import type { ConsolidationPipeline } from '@realmchat/memory'
import { sliceForConsolidation, type ContextStore } from '@realmchat/conversation'

/**
 * Hands every session the store expires to consolidation. Several workers may
 * subscribe; the store lets only one of them claim each expired session.
 */
export function watchSessionExpiry(store: ContextStore, consolidation: ConsolidationPipeline): Promise<() => Promise<void>> {
    return store.onExpired(async session => {
        const jobId = consolidation.submit(sliceForConsolidation(session, 'session-expired'))
        console.log(`[consolidation] Session ${session.id} expired${jobId ? `, queued ${jobId}` : ', nothing to consolidate'}`)
    })
}
