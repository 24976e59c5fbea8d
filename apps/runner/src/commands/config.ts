/**
 * Config Command
 *
 * Prints the effective configuration. Secrets are only reported as set or
 * missing.
 */

import { X_SECRET_NAMES } from '@lingo-shorts/core';
import type { AppConfig } from '@lingo-shorts/core';
import { loadAppConfig } from './app-config.js';

const SECRET_NAMES = ['GEMINI_API_KEY', 'OPENAI_API_KEY', ...X_SECRET_NAMES];

export function secretStatus(env: Record<string, string | undefined>): Array<{ name: string; set: boolean }> {
  return SECRET_NAMES.map(name => ({ name, set: Boolean(env[name]?.trim()) }));
}

export function configLines(config: AppConfig): string[] {
  const sections: Array<[string, Record<string, string | number>]> = [
    ['models', config.models],
    ['paths', config.paths],
    ['server', config.server],
    ['video', config.video],
    ['post', config.post],
  ];
  const lines: string[] = [];
  for (const [section, values] of sections) {
    for (const [key, value] of Object.entries(values)) {
      lines.push(`${section}.${key}: ${value}`);
    }
  }
  return lines;
}

export async function showConfig(): Promise<void> {
  const config = loadAppConfig();

  console.log('\n⚙️  Configuration\n');
  for (const line of configLines(config)) {
    console.log(`  ${line}`);
  }

  console.log('\n🔑 Secrets\n');
  for (const { name, set } of secretStatus(process.env)) {
    console.log(`  ${set ? '✅' : '❌'} ${name}`);
  }
  console.log('');
}
