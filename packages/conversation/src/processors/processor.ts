import type { Mode, Realm } from '@realmchat/shared'
import type { ModeEvent } from '../mode-machine'
import type { Session } from '../schemas'
import type { Prompt, TurnInsights } from '../types'
import type { MemoryLookup } from './memory'

export interface TurnContext {
    session: Session
    message: string
    turnId: string
    realms?: readonly Realm[]
    contextDepth: number
    now: number
}

export interface TurnPlan {
    prompt: Prompt
    memory: MemoryLookup
    /** Mode events recorded with the turn whatever the response turns out to be. */
    events: ModeEvent[]
    insights: TurnInsights
    /** Events that depend on the response, e.g. a completed task. */
    complete(response: string, partial: boolean): ModeEvent[]
}

export interface ModeProcessor {
    readonly mode: Mode
    plan(context: TurnContext): Promise<TurnPlan>
}
