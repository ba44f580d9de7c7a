import { z } from 'zod'
import { ValidationError } from '../core/errors.js'
import type { LearningMode } from './types.js'

const LinkUrlSchema = z
    .string()
    .trim()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), 'Only http and https links are supported')

export function deepDiveMode(topic: string): LearningMode {
    const trimmed = topic.trim()
    if (!trimmed) throw new ValidationError('Topic cannot be empty')
    return { kind: 'deep_dive', topic: trimmed }
}

export function linkMode(url: string): LearningMode {
    const parsed = LinkUrlSchema.safeParse(url)
    if (!parsed.success) throw new ValidationError(`Invalid URL "${url.trim()}". Use a full http(s) address.`)
    return { kind: 'link', url: parsed.data }
}
