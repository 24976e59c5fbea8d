export type { GenerateOptions, TextGenerator } from './text-generator.js';
export { GeminiTextGenerator } from './gemini-generator.js';
export type { GeminiGeneratorConfig } from './gemini-generator.js';
export { OpenAITextGenerator } from './openai-generator.js';
export type { OpenAIGeneratorConfig } from './openai-generator.js';
export { parseJsonArray, stripCodeFence, extractTemplateKey } from './response-parser.js';
export type { JsonArrayResult, TemplateExtraction } from './response-parser.js';
export { createTextGenerator } from './factory.js';
