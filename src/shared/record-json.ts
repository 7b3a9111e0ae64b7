import { z } from 'zod';
import { errorMessage } from './errors.js';
import type { AnnotationEntry, AnnotationRecord, OrganizedIdeas } from './types.js';

export const transcriptionSchema = z.union([
  z.object({ error: z.string() }),
  z.object({ type: z.string(), transcription: z.string() }),
]);

const entrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('highlight'), content: z.string() }),
  z.object({
    type: z.literal('note'),
    image_path: z.string(),
    transcription: transcriptionSchema.optional(),
  }),
]);

const recordSchema = z.record(z.string().regex(/^\d+$/, 'location keys are decimal digits'), z.array(entrySchema));

export const organizedIdeasSchema = z.object({
  ideas: z.array(
    z.object({
      idea_location: z.coerce.string(),
      idea_index: z.coerce.number().int().nonnegative(),
      title: z.string().optional(),
      links: z.array(z.object({ ref_location: z.coerce.string() })).optional(),
    }),
  ),
});

/**
 * Serializes a record as a pretty-printed JSON object whose keys appear in
 * the record's order. `JSON.stringify` on a plain object would sort them.
 */
export function serializeRecord(record: AnnotationRecord): string {
  if (record.size === 0) return '{}\n';
  const members = [...record].map(
    ([location, entries]) => `  ${JSON.stringify(location)}: ${JSON.stringify(entries, null, 2).replace(/\n/g, '\n  ')}`,
  );
  return `{\n${members.join(',\n')}\n}\n`;
}

function closingQuote(json: string, start: number): number {
  for (let i = start + 1; i < json.length; i++) {
    if (json[i] === '\\') i++;
    else if (json[i] === '"') return i;
  }
  return json.length;
}

/**
 * Keys of the top-level object, in source order. Only meaningful for text
 * that `JSON.parse` has already accepted.
 */
export function topLevelKeys(json: string): string[] {
  const keys: string[] = [];
  let depth = 0;

  for (let i = 0; i < json.length; i++) {
    const ch = json[i];
    if (ch === '"') {
      const end = closingQuote(json, i);
      if (depth === 1) {
        let next = end + 1;
        while (next < json.length && /\s/.test(json[next])) next++;
        const key: unknown = json[next] === ':' ? JSON.parse(json.slice(i, end + 1)) : undefined;
        if (typeof key === 'string') keys.push(key);
      }
      i = end;
    } else if (ch === '{' || ch === '[') {
      depth++;
    } else if (ch === '}' || ch === ']') {
      depth--;
    }
  }

  return keys;
}

export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: string };

function parseJson(json: string): DecodeResult<unknown> {
  try {
    return { ok: true, value: JSON.parse(json) };
  } catch (err) {
    return { ok: false, error: `invalid JSON (${errorMessage(err)})` };
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/** Parses the persisted form back into a record, keeping key order */
export function parseRecord(json: string): DecodeResult<AnnotationRecord> {
  const raw = parseJson(json);
  if (!raw.ok) return raw;

  const parsed = recordSchema.safeParse(raw.value);
  if (!parsed.success) {
    return { ok: false, error: formatIssues(parsed.error) };
  }

  const record: AnnotationRecord = new Map();
  for (const key of topLevelKeys(json)) {
    const entries: AnnotationEntry[] | undefined = parsed.data[key];
    if (entries && !record.has(key)) record.set(key, entries);
  }
  return { ok: true, value: record };
}

export function serializeIdeas(ideas: OrganizedIdeas): string {
  return JSON.stringify(ideas, null, 2) + '\n';
}

export function parseIdeas(json: string): DecodeResult<OrganizedIdeas> {
  const raw = parseJson(json);
  if (!raw.ok) return raw;
  const parsed = organizedIdeasSchema.safeParse(raw.value);
  if (!parsed.success) {
    return { ok: false, error: formatIssues(parsed.error) };
  }
  return { ok: true, value: parsed.data };
}
