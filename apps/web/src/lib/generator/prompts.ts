import type { GenerationKind } from '../sync/types';

export const DEFAULT_PROMPTS: Record<GenerationKind, string> = {
  title: [
    'Write a catchy radio headline (max 60 characters) that:',
    '- States the core message directly',
    '- Is newsworthy and appealing to listeners',
    '- Works when read aloud',
    '- Uses active phrasing',
  ].join('\n'),
  speech: [
    'Rewrite the text as natural radio speech with:',
    '- Short, clear sentences (max 15 words)',
    '- Spoken language and radio phrasing',
    '- A logical order for listeners',
    '- Clear transitions between points',
    '- Active sentence structure',
    '- Numbers written out where natural',
  ].join('\n'),
};
