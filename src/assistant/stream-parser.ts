import { z } from 'zod'

const ContentBlockSchema = z
    .object({
        type: z.string(),
        text: z.string().optional(),
    })
    .passthrough()

const AssistantEventSchema = z.object({
    type: z.literal('assistant'),
    message: z.object({ content: z.array(ContentBlockSchema) }),
})

const ResultEventSchema = z.object({
    type: z.literal('result'),
    session_id: z.string(),
    result: z.string().optional(),
    is_error: z.boolean().optional(),
})

export type StreamEvent =
    | { kind: 'text'; text: string }
    | { kind: 'result'; sessionId: string; isError: boolean; result: string }

/**
 * Parses one line of `--output-format stream-json` output. Lines that are not
 * JSON or carry event types Holocron does not use yield an empty list.
 */
export function parseStreamLine(line: string): StreamEvent[] {
    const trimmed = line.trim()
    if (!trimmed) return []

    let raw: unknown
    try {
        raw = JSON.parse(trimmed)
    } catch {
        return []
    }

    const assistant = AssistantEventSchema.safeParse(raw)
    if (assistant.success) {
        const events: StreamEvent[] = []
        for (const block of assistant.data.message.content) {
            if (block.type === 'text' && block.text) events.push({ kind: 'text', text: block.text })
        }
        return events
    }

    const result = ResultEventSchema.safeParse(raw)
    if (result.success) {
        return [
            {
                kind: 'result',
                sessionId: result.data.session_id,
                isError: result.data.is_error ?? false,
                result: result.data.result ?? '',
            },
        ]
    }

    return []
}
