import {
    buildMemoryContext,
    describeEntry,
    isBindingPolicy,
    type HierarchicalMemorySearcher,
    type ResolvedMemoryEntry,
} from '@realmchat/memory'
import { anchorQueryFor, analyzeIntent, isTaskShaped } from './intent'
import { biasTowards, hasType, lookupMemory } from './memory'
import type { ModeProcessor, TurnContext, TurnPlan } from './processor'
import { DEGRADED_NOTE, MEMORY_UNAVAILABLE_NOTE, clip, historyMessages } from './prompt'
import type { Intent } from '../types'

const PROCEDURE_MARKERS = ['procedure', 'sop', 'guide', 'steps']

const TASK_INSTRUCTIONS: Record<Intent['taskType'], string> = {
    procedure: 'Give step-by-step instructions that follow the procedures below exactly. Be direct and actionable.',
    troubleshooting: 'Diagnose the problem and walk through the fix, using the procedures below where they apply.',
    information: 'Answer the question precisely, grounded in the knowledge below.',
    creation: 'Produce what was asked for, following any procedure or template below.',
    search: 'Point the user to what they are looking for, citing where it comes from.',
    general: 'Help with the request. Stay brief and factual.',
}

/**
 * Passive helper: answers the request in front of it, following procedures
 * from memory and treating CLIENT policy as binding.
 */
export class AgentProcessor implements ModeProcessor {
    readonly mode = 'agent' as const

    constructor(private readonly searcher: HierarchicalMemorySearcher) { }

    async plan(context: TurnContext): Promise<TurnPlan> {
        const { session, message } = context
        const intent = analyzeIntent(message)

        const memory = await lookupMemory(this.searcher, anchorQueryFor(intent, message), session.identity, {
            realms: context.realms,
            maxDepth: context.contextDepth,
        })
        const entries = memory.result ? biasTowards(memory.result.entries, ['SKILL_MODULE', 'CLIENT']) : []

        // The searcher keeps binding policies through its cut, whatever they scored
        const policies = entries.filter(isBindingPolicy)
        const procedures = entries.filter(entry => hasType(entry, PROCEDURE_MARKERS)).slice(0, 3)
        const background = entries.filter(entry => !policies.includes(entry) && !procedures.includes(entry))

        const proceduresUsed = procedures.map(p => p.entityName)
        const policiesApplied = policies.map(p => p.entityName)

        const system = [
            `You are ${session.identity.actorType}, an assistant acting for this organisation. Work passively: do what is asked, nothing more.`,
            TASK_INSTRUCTIONS[intent.taskType],
            policies.length > 0 ? policySection(policies) : null,
            buildMemoryContext(procedures, { heading: 'Procedures', emptyText: 'No specific procedures found.' }),
            background.length > 0 ? buildMemoryContext(background, { heading: 'Relevant knowledge', limit: 5 }) : null,
            memory.unavailable ? MEMORY_UNAVAILABLE_NOTE : memory.result?.degraded ? DEGRADED_NOTE : null,
        ].filter((part): part is string => part !== null).join('\n\n')

        return {
            prompt: { system, messages: historyMessages(session.history, message) },
            memory,
            events: [],
            insights: { mode: 'agent', intent, proceduresUsed, policiesApplied },
            complete: (_response, partial) => {
                if (partial || !isTaskShaped(intent)) return []
                return [{
                    type: 'task-completed',
                    outcome: {
                        id: `${context.turnId}:outcome`,
                        turnId: context.turnId,
                        taskType: intent.taskType,
                        action: intent.action,
                        request: message,
                        summary: outcomeSummary(intent, message, proceduresUsed, policiesApplied),
                        proceduresUsed,
                        policiesApplied,
                        ts: context.now,
                    },
                }]
            },
        }
    }
}

function policySection(policies: readonly ResolvedMemoryEntry[]): string {
    return [
        '## Organisation policy (binding, overrides any other guidance)',
        ...policies.map(describeEntry),
        'If the request conflicts with a policy above, follow the policy and say which one applies.',
    ].join('\n')
}

function outcomeSummary(intent: Intent, message: string, procedures: string[], policies: string[]): string {
    let summary = `Handled ${intent.taskType} request "${clip(message, 120)}"`
    if (procedures.length > 0) summary += ` following ${procedures.join(', ')}`
    if (policies.length > 0) summary += `; applied policy ${policies.join(', ')}`
    return `${summary}.`
}
