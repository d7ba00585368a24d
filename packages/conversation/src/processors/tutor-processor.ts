import { buildMemoryContext, type HierarchicalMemorySearcher } from '@realmchat/memory'
import { describeError, withTimeout } from '@realmchat/shared'
import { applyEvents, type ModeEvent } from '../mode-machine'
import type { LearningProgress } from '../schemas'
import type { ComprehensionSignal, ResponseGenerator } from '../types'
import { extractTopic, followUpQuestions, learningObjective, levelGuidance, suggestNextTopics } from './learning'
import { biasTowards, lookupMemory } from './memory'
import type { ModeProcessor, TurnContext, TurnPlan } from './processor'
import { DEGRADED_NOTE, MEMORY_UNAVAILABLE_NOTE, historyMessages } from './prompt'

const ELICIT_TOPIC = `You are a friendly, proactive tutor. The learner has not chosen a topic yet.
Do not answer or teach anything substantive in this reply. Greet them briefly and ask
what they would like to learn, offering two or three example goals they could pick.`

/**
 * Proactive teacher. Until the learner names a topic the only job is to ask
 * for one; after that every turn is sized to the learner's level and ends
 * with where to go next.
 */
export class TutorProcessor implements ModeProcessor {
    readonly mode = 'tutor' as const

    constructor(
        private readonly searcher: HierarchicalMemorySearcher,
        private readonly generator: ResponseGenerator,
        private readonly assessmentTimeoutMs: number,
    ) { }

    async plan(context: TurnContext): Promise<TurnPlan> {
        const { session, message } = context
        if (session.state.mode !== 'tutor') {
            throw new Error(`Session ${session.id} is in ${session.state.mode} mode`)
        }

        const learning = session.state.learning
        const requestedTopic = extractTopic(message)
        const events: ModeEvent[] = []

        if (requestedTopic && requestedTopic !== learning.topic) {
            events.push({ type: 'topic-selected', topic: requestedTopic })
        } else if (learning.topic) {
            events.push({ type: 'comprehension', signal: await this.assess(message, session.history.at(-1)?.response ?? null) })
        }

        const projected = applyEvents(session.state, events).state
        const progress: LearningProgress = projected.mode === 'tutor' ? projected.learning : learning

        if (!progress.topic) return this.elicitTopic(context, progress)

        const topic = progress.topic
        const memory = await lookupMemory(this.searcher, `${topic}: ${message}`, session.identity, {
            realms: context.realms,
            maxDepth: context.contextDepth,
        })
        const entries = memory.result ? biasTowards(memory.result.entries, ['ACTOR_CLASS', 'SKILL_MODULE']) : []

        const objective = learningObjective(message, topic)
        const suggestedTopics = suggestNextTopics(topic, progress.level, entries, progress.priorTopics)
        const questions = followUpQuestions(topic, progress.level, entries)

        const system = [
            'You are a friendly, proactive tutor.',
            `Learning topic: ${topic}`,
            `Learning objective: ${objective}`,
            `Learner understanding level: ${progress.level}/5`,
            `Guidance: ${levelGuidance(progress.level)}`,
            buildMemoryContext(entries, { heading: 'Available knowledge', limit: 5 }),
            memory.unavailable ? MEMORY_UNAVAILABLE_NOTE : memory.result?.degraded ? DEGRADED_NOTE : null,
            `Build on what the learner already understands, use examples from the knowledge above when relevant, and close by offering these next topics: ${suggestedTopics.join('; ')}.`,
        ].filter((part): part is string => part !== null).join('\n')

        events.push({ type: 'topics-suggested', topics: suggestedTopics })

        return {
            prompt: { system, messages: historyMessages(session.history, message) },
            memory,
            events,
            insights: {
                mode: 'tutor',
                awaitingTopic: false,
                topic,
                level: progress.level,
                objective,
                suggestedTopics,
                followUpQuestions: questions,
            },
            complete: () => [],
        }
    }

    private elicitTopic(context: TurnContext, progress: LearningProgress): TurnPlan {
        return {
            prompt: { system: ELICIT_TOPIC, messages: historyMessages(context.session.history, context.message) },
            memory: { result: null, unavailable: false },
            events: [],
            insights: {
                mode: 'tutor',
                awaitingTopic: true,
                topic: null,
                level: progress.level,
                objective: null,
                suggestedTopics: [],
                followUpQuestions: [],
            },
            complete: () => [],
        }
    }

    private async assess(message: string, previousResponse: string | null): Promise<ComprehensionSignal> {
        const controller = new AbortController()
        try {
            return await withTimeout(
                this.generator.assessComprehension(message, previousResponse, { signal: controller.signal }),
                this.assessmentTimeoutMs,
                'comprehension check',
            )
        } catch (err) {
            controller.abort()
            console.warn(`[engine] Comprehension check failed, assuming neutral: ${describeError(err)}`)
            return 'neutral'
        }
    }
}
