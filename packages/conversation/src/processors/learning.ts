import type { ResolvedMemoryEntry } from '@realmchat/memory'

const TOPIC_PATTERNS = [
    /\bteach me(?: about| how to)? (.+)/i,
    /\bi (?:want|would like|'d like) to (?:learn|understand|study)(?: about| how to)? (.+)/i,
    /\b(?:learn|learning) about (.+)/i,
    /\bhelp me (?:understand|learn)(?: about)? (.+)/i,
    /\b(?:explain|introduce) (.+?) to me\b/i,
]

/** The learning topic a message asks for, if it names one. */
export function extractTopic(message: string): string | null {
    for (const pattern of TOPIC_PATTERNS) {
        const raw = pattern.exec(message)?.[1]
        if (!raw) continue
        const topic = raw.replace(/[.?!]+\s*$/, '').replace(/^(?:the|a|an) /i, '').trim()
        if (topic.length >= 2 && topic.length <= 80) return topic
    }
    return null
}

const LEVEL_GUIDANCE: Record<number, string> = {
    1: 'Explain in very simple terms with basic examples',
    2: 'Explain clearly with simple examples',
    3: 'Provide balanced explanation with examples',
    4: 'Include more detail and connections',
    5: 'Provide advanced explanation with nuances',
}

export function levelGuidance(level: number): string {
    return LEVEL_GUIDANCE[level] ?? LEVEL_GUIDANCE[3]
}

export function learningObjective(message: string, topic: string): string {
    const question = message.trim().replace(/\?+$/, '')
    const lower = question.toLowerCase()
    if (lower.startsWith('how do i ')) return `Learn to ${question.slice(9)}`
    if (lower.startsWith('what is ')) return `Understand ${question.slice(8)}`
    if (lower.startsWith('why ')) return `Understand the reasoning behind ${question.slice(4)}`
    if (lower.startsWith('when should ')) return `Learn when to apply ${question.slice(12)}`
    return `Deepen understanding of ${topic}`
}

export function followUpQuestions(topic: string, level: number, entries: readonly ResolvedMemoryEntry[]): string[] {
    const questions = level <= 2
        ? [
            `Would you like a simpler explanation of ${topic}?`,
            'What part would you like me to clarify?',
            'Shall we go through an example together?',
        ]
        : level === 3
            ? [
                'How do you think this applies to your work?',
                'What aspects interest you most?',
                'Would you like to explore a related concept?',
            ]
            : [
                'What are your thoughts on alternative approaches?',
                'How does this connect with what you already know?',
                'What advanced aspects would you like to explore?',
            ]

    const anchor = entries[0]?.entityName
    return (anchor ? [`Would you like to dive deeper into ${anchor}?`, ...questions] : questions).slice(0, 3)
}

/**
 * 1–3 next topics: related topics carried by the resolved entries first,
 * then a level-based progression of the current topic.
 */
export function suggestNextTopics(
    topic: string,
    level: number,
    entries: readonly ResolvedMemoryEntry[],
    priorTopics: readonly string[],
): string[] {
    const excluded = new Set([topic, ...priorTopics].map(t => t.toLowerCase()))
    const candidates = [
        ...entries.slice(0, 10).flatMap(entry => entry.relatedTopics ?? []),
        level >= 3 ? `Advanced ${topic}` : `${topic} fundamentals`,
        `${topic} in practice`,
    ]

    const seen = new Set<string>()
    const suggestions: string[] = []
    for (const candidate of candidates) {
        const key = candidate.trim().toLowerCase()
        if (!key || excluded.has(key) || seen.has(key)) continue
        seen.add(key)
        suggestions.push(candidate.trim())
    }
    return suggestions.slice(0, 3)
}
