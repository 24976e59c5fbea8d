import type { ScriptItem } from './types.js';

export interface ScriptPromptOptions {
  count: number;
  wordsPerScript?: number;
  cefrLevel?: string;
}

export function buildScriptPrompt(history: readonly ScriptItem[], options: ScriptPromptOptions): string {
  const { count, wordsPerScript = 90, cefrLevel = 'B1' } = options;
  const plural = count === 1 ? 'script' : 'scripts';

  return `You write scripts for short English shadowing videos that do well on social media.
Write exactly ${count} new ${plural}.

# Most important
- Every script in this batch must cover a completely different topic from the others.
- Do not reuse the topic or content of any previously written script listed below. They are a record, not style examples; do not imitate them.

# Requirements
- Each script is about ${wordsPerScript} words of English plus a natural Japanese translation.
- Use CEFR ${cefrLevel} English.
- The narrator is male.
- Open with a few easy words that make the viewer wonder "wait, what is this about?".
- Choose topics people want to argue about in the comments: divisive everyday questions, dating and relationships, and things Japanese viewers relate to as much as English speakers do.
- End every script with an unexpected, genuinely funny punchline.

# Previously written scripts
${JSON.stringify(history, null, 2)}

# Output format
- Output all ${count} ${plural} as one JSON array and nothing else.
- Each element is an object with exactly the keys "english_script" and "japanese_translation".
[
  {
    "english_script": "First English script",
    "japanese_translation": "1つ目の日本語訳"
  }
]`;
}
