import type { LearningMode } from '../session/types.js'

export function buildDeepDivePrompt(topic: string): string {
    return `I want to learn about: ${topic}

Please explain this topic in technical detail. Cover:
1. Core concepts and how they work
2. Practical examples with code where applicable
3. Common use cases and best practices
4. Common pitfalls to avoid

Be thorough but focused. I'll ask follow-up questions to go deeper on specific aspects.`
}

export function buildLinkPrompt(url: string): string {
    return `Please analyze this article/resource: ${url}

Provide:
1. A brief summary of the main points
2. Key technical concepts explained
3. Practical takeaways or code examples if applicable
4. Your assessment of what's most valuable to learn from this

Fetch the content first, then explain it thoroughly. I'll ask follow-up questions about specific parts.`
}

export function buildOpeningPrompt(mode: LearningMode): string {
    return mode.kind === 'deep_dive' ? buildDeepDivePrompt(mode.topic) : buildLinkPrompt(mode.url)
}
