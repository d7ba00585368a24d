import type { Mode } from '@realmchat/shared'
import type { TaskOutcome } from '@realmchat/memory'
import {
    INITIAL_LEVEL,
    LEARNING_PATH_LIMIT,
    MAX_LEVEL,
    MIN_LEVEL,
    type LearningProgress,
    type ModeState,
} from './schemas'
import type { ComprehensionSignal } from './types'

export type ModeEvent =
    | { type: 'switch'; mode: Mode }
    | { type: 'topic-selected'; topic: string }
    | { type: 'comprehension'; signal: ComprehensionSignal }
    | { type: 'topics-suggested'; topics: string[] }
    | { type: 'task-completed'; outcome: TaskOutcome }
    | { type: 'outcomes-consolidated'; outcomeIds: string[] }

export type ModeEffect =
    | { type: 'learning-cleared'; learning: LearningProgress }
    | { type: 'outcomes-cleared'; outcomes: TaskOutcome[] }
    | { type: 'topic-changed'; from: string | null; to: string }
    | { type: 'level-changed'; from: number; to: number }

export interface Transition {
    state: ModeState
    effects: ModeEffect[]
}

export function initialLearning(): LearningProgress {
    return { topic: null, level: INITIAL_LEVEL, priorTopics: [], suggestedTopics: [] }
}

export function initialModeState(mode: Mode): ModeState {
    return mode === 'tutor'
        ? { mode: 'tutor', learning: initialLearning() }
        : { mode: 'agent', outcomes: [] }
}

export function clampLevel(level: number): number {
    return Math.min(MAX_LEVEL, Math.max(MIN_LEVEL, Math.round(level)))
}

function unchanged(state: ModeState): Transition {
    return { state, effects: [] }
}

// Most recent last, no repeats, bounded
function appendToPath(path: readonly string[], topic: string): string[] {
    return [...path.filter(t => t !== topic), topic].slice(-LEARNING_PATH_LIMIT)
}

/**
 * The tutor/agent machine. Pure: the caller applies the returned state inside
 * a session mutate and acts on the effects once the write has landed. Events
 * that do not apply to the current mode leave the state untouched.
 */
export function transition(state: ModeState, event: ModeEvent): Transition {
    switch (event.type) {
        case 'switch': {
            if (event.mode === state.mode) return unchanged(state)
            const effects: ModeEffect[] = state.mode === 'tutor'
                ? [{ type: 'learning-cleared', learning: state.learning }]
                : [{ type: 'outcomes-cleared', outcomes: state.outcomes }]
            return { state: initialModeState(event.mode), effects }
        }

        case 'topic-selected': {
            if (state.mode !== 'tutor') return unchanged(state)
            const { learning } = state
            const topic = event.topic.trim()
            if (!topic || topic === learning.topic) return unchanged(state)
            return {
                state: {
                    mode: 'tutor',
                    learning: {
                        ...learning,
                        topic,
                        priorTopics: learning.topic ? appendToPath(learning.priorTopics, learning.topic) : learning.priorTopics,
                        suggestedTopics: [],
                    },
                },
                effects: [{ type: 'topic-changed', from: learning.topic, to: topic }],
            }
        }

        case 'comprehension': {
            if (state.mode !== 'tutor' || event.signal === 'neutral') return unchanged(state)
            const from = state.learning.level
            const to = clampLevel(from + (event.signal === 'comprehension' ? 1 : -1))
            if (to === from) return unchanged(state)
            return {
                state: { mode: 'tutor', learning: { ...state.learning, level: to } },
                effects: [{ type: 'level-changed', from, to }],
            }
        }

        case 'topics-suggested': {
            if (state.mode !== 'tutor') return unchanged(state)
            return {
                state: { mode: 'tutor', learning: { ...state.learning, suggestedTopics: event.topics.slice(0, 3) } },
                effects: [],
            }
        }

        case 'task-completed': {
            if (state.mode !== 'agent') return unchanged(state)
            if (state.outcomes.some(o => o.id === event.outcome.id)) return unchanged(state)
            return { state: { mode: 'agent', outcomes: [...state.outcomes, event.outcome] }, effects: [] }
        }

        case 'outcomes-consolidated': {
            if (state.mode !== 'agent') return unchanged(state)
            const consolidated = new Set(event.outcomeIds)
            const outcomes = state.outcomes.filter(o => !consolidated.has(o.id))
            if (outcomes.length === state.outcomes.length) return unchanged(state)
            return { state: { mode: 'agent', outcomes }, effects: [] }
        }
    }
}

export function applyEvents(state: ModeState, events: readonly ModeEvent[]): Transition {
    return events.reduce<Transition>((acc, event) => {
        const next = transition(acc.state, event)
        return { state: next.state, effects: [...acc.effects, ...next.effects] }
    }, unchanged(state))
}
