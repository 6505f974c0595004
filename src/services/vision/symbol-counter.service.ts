import Ajv from 'ajv';
import OpenAI from 'openai';

import { config } from '../../config/env';
import type { PageImage } from '../../types/document';
import { COUNT_CATEGORIES, type CountCategory, type CountSnapshot } from '../../types/takeoff';
import { compactCounts } from '../../utils/count-snapshot';
import { createScopedLogger, type ScopedLogger } from '../../utils/logger';
import { describeError } from '../../utils/takeoff-error';

/** Counts symbols on a rendered page. Output is treated as low-confidence counts. */
export interface SymbolCounter {
  countSymbols(image: PageImage, instructions: string): Promise<CountSnapshot>;
}

interface CountResponse {
  counts: Record<string, Record<string, number>>;
}

const COUNT_RESPONSE_SCHEMA = {
  type: 'object',
  required: ['counts'],
  properties: {
    counts: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        additionalProperties: { type: 'integer', minimum: 0 },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateCountResponse = ajv.compile<CountResponse>(COUNT_RESPONSE_SCHEMA);

const isCountCategory = (value: string): value is CountCategory =>
  COUNT_CATEGORIES.some((category) => category === value);

/** Body of a fenced ```json block, else the outermost brace span. */
export const extractJsonObject = (content: string): string | null => {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(content);
  if (fenced) {
    return fenced[1].trim();
  }
  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  return start >= 0 && end > start ? content.slice(start, end + 1) : null;
};

/**
 * Maps a model reply to counts. Anything unparseable or off-schema becomes `{}`
 * with a warning; nothing is retried.
 */
export const parseCountResponse = (
  content: string,
  log: ScopedLogger = createScopedLogger('SymbolCounter'),
): CountSnapshot => {
  const json = extractJsonObject(content);
  if (!json) {
    log.warn('Count response contained no JSON object');
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    log.warn(`Count response is not valid JSON: ${describeError(error)}`);
    return {};
  }

  if (!validateCountResponse(parsed)) {
    const detail = validateCountResponse.errors
      ?.map((err) => `${err.instancePath} ${err.message ?? ''}`.trim())
      .join('; ');
    log.warn(`Count response failed schema validation: ${detail ?? 'unknown error'}`);
    return {};
  }

  const snapshot: CountSnapshot = {};
  for (const [category, items] of Object.entries(parsed.counts)) {
    if (!isCountCategory(category)) {
      log.debug(`Ignoring unknown count category "${category}"`);
      continue;
    }
    snapshot[category] = compactCounts(items);
  }
  return snapshot;
};

export interface OpenAiSymbolCounterOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  maxRetries?: number;
}

export class OpenAiSymbolCounter implements SymbolCounter {
  private readonly logger = createScopedLogger('OpenAiSymbolCounter');
  private readonly openai?: OpenAI;
  private readonly model: string;

  constructor(options: OpenAiSymbolCounterOptions = {}) {
    const apiKey = options.apiKey ?? config.openAiApiKey;
    if (apiKey) {
      this.openai = new OpenAI({
        apiKey,
        timeout: options.timeoutMs ?? config.openAiTimeoutMs,
        maxRetries: options.maxRetries ?? config.openAiMaxRetries,
      });
    } else {
      this.logger.warn('OPENAI_API_KEY not configured - optical counting disabled');
    }
    this.model = options.model ?? config.openAiSymbolCounterModel ?? config.openAiModel;
  }

  isEnabled(): boolean {
    return Boolean(this.openai);
  }

  async countSymbols(image: PageImage, instructions: string): Promise<CountSnapshot> {
    if (!this.openai) {
      return {};
    }

    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        response_format: { type: 'json_object' },
        messages: [
          {
            role: 'system',
            content:
              'You count symbols on electrical construction drawings. Report only what is drawn. No prose.',
          },
          {
            role: 'user',
            content: [
              { type: 'text', text: instructions },
              {
                type: 'image_url',
                image_url: {
                  url: `data:${image.mimeType};base64,${image.data.toString('base64')}`,
                  detail: 'high',
                },
              },
            ],
          },
        ],
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        this.logger.warn('Empty response from OpenAI');
        return {};
      }
      return parseCountResponse(content, this.logger);
    } catch (error) {
      this.logger.error(`Optical counting failed: ${describeError(error)}`);
      return {};
    }
  }
}
