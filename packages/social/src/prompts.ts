export interface PostPromptOptions {
  hashtags: string;
  maxLength: number;
}

export function buildSlangPrompt(postedSlangs: readonly string[], options: PostPromptOptions): string {
  return `You are a friendly, popular creator of English-learning posts for Japanese learners on X.
Pick ONE fun, memorable English slang expression and write a post introducing it.

# Requirements
- Never use an expression from the "Already posted" list below.
- Include the slang, its meaning in Japanese, one short natural English example sentence and its Japanese translation.
- Keep the whole post within X's ${options.maxLength}-character limit.
- Prefer fairly recent slang, or expressions that are fun to know, that Japanese learners would find interesting.
- Keep the tone bright and friendly with a few emoji (😁🎉 and similar).
- End the post with exactly these hashtags: ${options.hashtags}

# Already posted
${JSON.stringify(postedSlangs)}

# Output format
Output a JSON array containing exactly one object and nothing else:
[
  {
    "slang": "the expression you chose (e.g. 'spill the tea')",
    "post_text": "the full post text, including slang, meaning, example and hashtags"
  }
]`;
}

export function buildPhrasePrompt(
  postedPhrases: readonly string[],
  options: PostPromptOptions & { marker: string },
): string {
  return `You are a friendly, popular creator of English-learning posts for Japanese learners on X.
Pick ONE useful, natural English phrase for everyday conversation and write a post introducing it.

# Requirements
- Never use a phrase from the "Already posted" list below.
- Keep the whole post within X's ${options.maxLength}-character limit.
- Follow the template exactly. The first line is the header, the second line is the phrase alone.
- Output only the post text: no JSON, no quotes, no code fences.

# Template
${options.marker}
<the English phrase>
💡 <meaning in Japanese>
🗣️ <short English example sentence>
🇯🇵 <Japanese translation of the example>
${options.hashtags}

# Already posted
${JSON.stringify(postedPhrases)}`;
}
