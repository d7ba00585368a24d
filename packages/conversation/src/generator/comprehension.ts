import type { ComprehensionSignal } from '../types'

const CONFUSION = [
    "i don't understand",
    'i do not understand',
    'confused',
    'what does that mean',
    'can you explain',
    "i'm lost",
    'too complex',
    'simpler',
]

const COMPREHENSION = [
    'i see',
    'that makes sense',
    'i understand',
    'got it',
    'what about',
    'how does this relate to',
    'advanced',
]

/** Keyword reading of a learner's reply; null when the words say nothing either way. */
export function detectComprehension(message: string): ComprehensionSignal | null {
    const lower = message.toLowerCase()
    if (CONFUSION.some(phrase => lower.includes(phrase))) return 'confusion'
    if (COMPREHENSION.some(phrase => lower.includes(phrase))) return 'comprehension'
    return null
}
