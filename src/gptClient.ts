import OpenAI from 'openai';
import { z } from 'zod';
import type { AppConfig } from './config.js';
import { resolveDate, type DateOptions } from './dateResolver.js';
import { delay } from './httpClient.js';
import { cleanText, errorMessage } from './textNormalizer.js';
import type { PartialCall, TextEnricher } from './types.js';

const PLACEHOLDER = /^(?:n\/?a|not specified|not available|unknown|none|tbd|-)$/i;

const looseText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    const text = cleanText(value === null || value === undefined ? '' : String(value));
    return PLACEHOLDER.test(text) ? '' : text;
  });

const EnrichmentSchema = z.object({
  title: looseText,
  deadline: looseText,
  eligibility: looseText,
  budget: looseText,
  area: looseText,
});

const SYSTEM_PROMPT = `
You extract structured facts about research funding calls (calls for proposals, grants, fellowships) from raw web page or PDF text.

Return ONLY a JSON object with these keys:
- title: the name of the call
- deadline: the application/submission deadline as YYYY-MM-DD
- eligibility: who can apply, one concise sentence
- budget: the funding amount or limit as stated (keep currency)
- area: one of Medical Research, Biotechnology, Physical Sciences, Chemical Sciences, Advanced Materials, Science & Technology, Science & Innovation

CRITICAL RULES:
- If a value is not explicitly stated, return an empty string. DO NOT invent data.
- Prefer the final submission deadline over intermediate dates (pre-proposal, publication date).
- Use English even if the source is in another language.
`;

/**
 * Validates a model reply. Tolerates prose around the JSON object and
 * placeholder values; the deadline must resolve to a plausible date.
 */
export function parseEnrichmentResponse(content: string, dateOptions: DateOptions = {}): PartialCall | null {
  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start === -1 || end <= start) return null;

  let json: unknown;
  try {
    json = JSON.parse(content.slice(start, end + 1));
  } catch {
    return null;
  }

  const parsed = EnrichmentSchema.safeParse(json);
  if (!parsed.success) return null;

  const fields: PartialCall = {};
  const { title, deadline, eligibility, budget, area } = parsed.data;
  if (title) fields.title = title;
  if (eligibility) fields.eligibility = eligibility;
  if (budget) fields.budget = budget;
  if (area) fields.area = area;
  const resolved = resolveDate(deadline, dateOptions);
  if (resolved) fields.deadline = resolved;

  return Object.keys(fields).length > 0 ? fields : null;
}

export interface OpenAIEnricherOptions {
  apiKey: string;
  model: string;
  maxChars: number;
  retries: number;
  timeoutMs: number;
  dateOptions?: DateOptions;
}

/** SDK retries are off; the enricher's own loop is the only retry policy. */
export function createOpenAIClient({ apiKey, timeoutMs }: Pick<OpenAIEnricherOptions, 'apiKey' | 'timeoutMs'>): OpenAI {
  return new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0 });
}

export class OpenAIEnricher implements TextEnricher {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAIEnricherOptions) {
    this.client = createOpenAIClient(options);
  }

  async enrich(text: string): Promise<PartialCall | null> {
    const blob = text.trim();
    if (!blob) return null;

    const { model, maxChars, retries } = this.options;
    const userPrompt = `Extract the funding call fields from this text.

TEXT (truncated to ${maxChars} chars):
---
${blob.substring(0, maxChars)}${blob.length > maxChars ? '\n...(truncated)' : ''}
---

Return ONLY valid JSON.`;

    for (let attempt = 1; attempt <= retries; attempt++) {
      try {
        const completion = await this.client.chat.completions.create({
          model,
          temperature: 0,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: userPrompt },
          ],
        });

        const content = completion.choices[0]?.message?.content;
        if (!content) {
          console.warn('   [GPT] Empty response');
          return null;
        }

        const fields = parseEnrichmentResponse(content, this.options.dateOptions);
        if (!fields) {
          console.warn('   [GPT] Response held no usable fields');
        }
        return fields;
      } catch (error) {
        console.error(`   [GPT] Error (attempt ${attempt}/${retries}): ${errorMessage(error)}`);
        if (attempt === retries) {
          return null;
        }
        const wait = Math.pow(2, attempt) * 1000;
        console.warn(`   [GPT] Retrying in ${wait}ms`);
        await delay(wait);
      }
    }

    return null;
  }
}

/** The enricher for this run, or null when no API key is configured. */
export function createOpenAIEnricher(config: AppConfig, dateOptions?: DateOptions): TextEnricher | null {
  if (!config.OPENAI_API_KEY) return null;
  return new OpenAIEnricher({
    apiKey: config.OPENAI_API_KEY,
    model: config.OPENAI_MODEL,
    maxChars: config.MAX_AI_CHARS,
    retries: config.AI_RETRIES,
    timeoutMs: config.REQUEST_TIMEOUT_MS,
    dateOptions,
  });
}
