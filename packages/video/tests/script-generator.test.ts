import { describe, it, expect, vi } from 'vitest';
import type { GenerateOptions, TextGenerator } from '@lingo-shorts/core';
import { ScriptGenerator } from '../src/script-generator.js';
import type { ScriptItem } from '../src/types.js';

class FakeTextGenerator implements TextGenerator {
  readonly name = 'fake';
  prompts: string[] = [];
  options: GenerateOptions[] = [];

  constructor(private reply: () => Promise<string>) {}

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    return this.reply();
  }
}

const history: ScriptItem[] = [
  { english_script: 'Should couples share phone passwords?', japanese_translation: 'カップルはスマホのパスワードを共有すべき？' },
];

describe('ScriptGenerator', () => {
  it('should return the scripts from a JSON array', async () => {
    const text = new FakeTextGenerator(async () => JSON.stringify([
      { english_script: 'Is being late ever okay?', japanese_translation: '遅刻はアリ？' },
      { english_script: 'Cats or dogs?', japanese_translation: '猫派？犬派？', mood: 'fun' },
    ]));
    const generator = new ScriptGenerator(text, { temperature: 1.8 });

    const scripts = await generator.generate(history, 2);

    expect(scripts).toEqual([
      { english_script: 'Is being late ever okay?', japanese_translation: '遅刻はアリ？' },
      { english_script: 'Cats or dogs?', japanese_translation: '猫派？犬派？' },
    ]);
    expect(text.options).toEqual([{ temperature: 1.8, json: true }]);
  });

  it('should embed the count and the full history in the prompt', async () => {
    const text = new FakeTextGenerator(async () => '[]');
    const generator = new ScriptGenerator(text, { temperature: 1.8 });

    await generator.generate(history, 10);

    expect(text.prompts[0]).toContain('Write exactly 10 new scripts.');
    expect(text.prompts[0]).toContain(JSON.stringify(history, null, 2));
  });

  it('should drop entries with the wrong shape', async () => {
    const text = new FakeTextGenerator(async () => JSON.stringify([
      { english_script: 'Valid one', japanese_translation: '有効' },
      { english_script: '', japanese_translation: '空' },
      { title: 'nope' },
      'just a string',
    ]));
    const generator = new ScriptGenerator(text, { temperature: 1.8 });

    expect(await generator.generate([], 4)).toEqual([{ english_script: 'Valid one', japanese_translation: '有効' }]);
  });

  it('should return nothing for a non-array response', async () => {
    const text = new FakeTextGenerator(async () => '{"english_script":"x","japanese_translation":"y"}');
    const generator = new ScriptGenerator(text, { temperature: 1.8 });

    expect(await generator.generate([], 1)).toEqual([]);
  });

  it('should return nothing for malformed JSON', async () => {
    const text = new FakeTextGenerator(async () => '[{"english_script": "cut off');
    const generator = new ScriptGenerator(text, { temperature: 1.8 });

    expect(await generator.generate([], 1)).toEqual([]);
  });

  it('should return nothing when the model call fails', async () => {
    const reply = vi.fn(async (): Promise<string> => {
      throw new Error('blocked: SAFETY');
    });
    const generator = new ScriptGenerator(new FakeTextGenerator(reply), { temperature: 1.8 });

    expect(await generator.generate([], 1)).toEqual([]);
    expect(reply).toHaveBeenCalledTimes(1);
  });
});
