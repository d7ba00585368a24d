import type { Intent, TaskType } from '../types'

const TASK_PATTERNS: Array<[Exclude<TaskType, 'general'>, string[]]> = [
    ['procedure', ['how to', 'how do i', 'steps to']],
    ['troubleshooting', ['fix', 'error', 'problem', 'issue']],
    ['information', ['what is', 'explain', 'definition']],
    ['creation', ['create', 'make', 'build', 'generate']],
    ['search', ['find', 'search', 'locate', 'where']],
]

const ACTION_VERBS = ['create', 'update', 'delete', 'find', 'fix', 'explain', 'show', 'list']

/** Keyword intent detection; first matching category wins. */
export function analyzeIntent(message: string): Intent {
    const lower = message.toLowerCase()
    const taskType = TASK_PATTERNS.find(([, words]) => words.some(word => lower.includes(word)))?.[0] ?? 'general'
    const action = ACTION_VERBS.find(verb => new RegExp(`\\b${verb}\\b`).test(lower)) ?? null
    const entities = [...message.matchAll(/"([^"]+)"/g)].map(match => match[1])
    return { taskType, action, entities }
}

export function anchorQueryFor(intent: Intent, message: string): string {
    switch (intent.taskType) {
        case 'procedure': return `procedure SOP steps: ${message}`
        case 'troubleshooting': return `troubleshooting fix solution: ${message}`
        default: return message
    }
}

export function isTaskShaped(intent: Intent): boolean {
    return intent.taskType !== 'general'
}
