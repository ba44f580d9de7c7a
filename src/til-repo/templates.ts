export const TIL_SKILL = `# /til - Generate TIL Entry

Generate a "Today I Learned" markdown entry based on the current conversation.

## Format Requirements
- H1 title describing the action (e.g., "Update A Forked Repo", "Rename A Git Branch")
- Opening that explains the situation or problem ("If you want to...", "There are times when...")
- Step-by-step flow: prose explaining what to do, then a code block, then more prose
- One command per code block when walking through steps
- Concise but complete: 10-30 lines

## Style Guidelines
- Conversational, second-person tone
- Start with WHY or WHEN, not a definition
- Keep code blocks clean; put explanations in prose before or after them
- Avoid heavy H2 structure
- End with one practical takeaway

## Output Format
Return ONLY the markdown content. No preamble.
`

export const NOTE_SKILL = `# /note - Generate Knowledge Base Note

Generate a comprehensive knowledge base note based on the current conversation, for a personal
knowledge base such as Obsidian or Logseq.

## Front-matter (YAML)
\`\`\`yaml
---
title: [Descriptive title]
date: [YYYY-MM-DD]
tags: [relevant, tags]
aliases: [alternative, names]
---
\`\`\`

## Content Structure
1. **Title** (H1)
2. **Overview** - 2-3 paragraphs introducing the concept
3. **Key Concepts** - detailed breakdown of the important ideas
4. **Examples** - code examples with annotations
5. **Gotchas & Tips**
6. **Session Q&A** - key questions and answers from the conversation
7. **Related Topics** - links using \`[[wiki-link]]\` format
8. **Sources** - only when the session analysed a URL

## Output Format
Return ONLY the markdown content, starting with the YAML front-matter. No preamble.
`

export const README_TEMPLATE = `# Today I Learned

A collection of concise write-ups on things I learn day to day.

0 TILs & Counting

---

### Categories

---
`
