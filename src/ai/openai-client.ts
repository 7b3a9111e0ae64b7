import OpenAI from 'openai';
import type { OpenAiSettings } from '../config.js';
import { ConfigurationError } from '../shared/errors.js';

export function createOpenAiClient(settings: OpenAiSettings): OpenAI {
  if (!settings.apiKey) {
    throw new ConfigurationError('OPENAI_API_KEY not found in environment.');
  }
  return new OpenAI({
    apiKey: settings.apiKey,
    ...(settings.project ? { project: settings.project } : {}),
    ...(settings.organization ? { organization: settings.organization } : {}),
  });
}

/**
 * Parses a model reply as JSON, falling back to the outermost `{...}` span
 * when the model wrapped its answer in prose or a code fence.
 */
export function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start >= 0 && end > start) {
      return JSON.parse(text.slice(start, end + 1));
    }
    throw new Error(`Model did not return JSON. Got: ${text.slice(0, 200)}…`);
  }
}

/** First message content of a chat completion, or an empty object literal */
export function completionText(completion: OpenAI.Chat.Completions.ChatCompletion): string {
  return completion.choices[0]?.message?.content ?? '{}';
}
