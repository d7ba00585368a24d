import type OpenAI from 'openai'

export type Embedder = (text: string) => Promise<number[]>

const CACHE_LIMIT = 500

// Cache embeddings for identical strings within a process lifetime
export function createOpenAIEmbedder(openai: OpenAI, model = 'text-embedding-3-small'): Embedder {
    const cache = new Map<string, number[]>()

    return async (text: string) => {
        const input = text.slice(0, 8000)    // max safe input
        const hit = cache.get(input)
        if (hit) return hit

        const response = await openai.embeddings.create({ model, input })
        const vector = response.data[0]?.embedding
        if (!vector) throw new Error('Embedding response contained no vector')

        if (cache.size >= CACHE_LIMIT) {
            const oldest = cache.keys().next()
            if (!oldest.done) cache.delete(oldest.value)
        }
        cache.set(input, vector)
        return vector
    }
}

