import { beforeEach, describe, expect, it } from 'vitest'
import { buildTilPrompt, generateTil } from '../../../src/generators/til.js'
import { Session } from '../../../src/session/session.js'
import { TEST_CONFIG } from '../../helpers/runtime.js'
import { ScriptedAssistant } from '../../helpers/scripted-assistant.js'

describe('generateTil', () => {
    let session: Session

    beforeEach(() => {
        session = new Session()
    })

    it('produces a skeleton without calling the assistant when nothing was discussed', async () => {
        const assistant = new ScriptedAssistant([])
        session.start({ kind: 'deep_dive', topic: 'Git Rebase' }, 'Git')

        const artifact = await generateTil({ session, config: TEST_CONFIG, assistant })

        expect(assistant.calls).toHaveLength(0)
        expect(artifact).toEqual({
            kind: 'til',
            title: 'Git Rebase',
            body: '# Git Rebase\n\nNothing was discussed in this session yet.\n',
            category: 'Git',
            suggestedPath: '/til/archive/git/git_rebase.md',
            root: '/til/archive',
            skeleton: true,
        })
    })

    it('asks the assistant with the session context and resumes its session', async () => {
        const assistant = new ScriptedAssistant([
            { text: '```markdown\n# Squash Commits With Rebase\n\nUse `git rebase -i`.\n```' },
        ])
        session.start({ kind: 'deep_dive', topic: 'git rebase' }, 'git')
        session.recordExchange('How do I squash?', 'Interactive rebase.', 'sess-1')

        const artifact = await generateTil({ session, config: TEST_CONFIG, assistant })

        const call = assistant.calls[0]
        expect(call?.options.resumeId).toBe('sess-1')
        expect(call?.prompt).toContain('Learning Session: Deep Dive: git rebase')
        expect(call?.prompt).toContain('User: How do I squash?')
        expect(artifact.title).toBe('Squash Commits With Rebase')
        expect(artifact.body).toBe('# Squash Commits With Rebase\n\nUse `git rebase -i`.')
        expect(artifact.suggestedPath).toBe('/til/archive/git/squash_commits_with_rebase.md')
        expect(artifact.skeleton).toBe(false)
    })

    it('falls back to a generic title outside any category', async () => {
        const assistant = new ScriptedAssistant([{ text: 'No heading at all.' }])
        session.recordExchange('q', 'a')

        const artifact = await generateTil({ session, config: TEST_CONFIG, assistant })

        expect(artifact.title).toBe('Untitled TIL')
        expect(artifact.suggestedPath).toBe('/til/archive/untitled_til.md')
        expect(artifact.category).toBeUndefined()
    })

    it('does not touch the transcript', async () => {
        const assistant = new ScriptedAssistant([{ text: '# T' }])
        session.recordExchange('q', 'a')
        await generateTil({ session, config: TEST_CONFIG, assistant })
        expect(session.transcript.size).toBe(2)
    })
})

describe('buildTilPrompt', () => {
    it('embeds the context and the format rules', () => {
        const prompt = buildTilPrompt('CONTEXT-MARKER\n')
        expect(prompt).toContain('CONTEXT-MARKER')
        expect(prompt).toContain('10-30 lines')
        expect(prompt).toContain('Return ONLY the markdown content.')
    })
})
