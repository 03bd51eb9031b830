/**
 * Prompted text classifier backed by OpenAI chat completions.
 * The model answers in JSON; the answer is validated against the label set.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import type { Classification, ITextClassifier } from './ITextClassifier.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const DEFAULT_TIMEOUT_MS = 15_000;

const classificationSchema = z.object({
  label: z.string(),
  score: z.number().min(0).max(1),
});

export class OpenAITextClassifier implements ITextClassifier {
  private client: OpenAI;
  private model: string;
  readonly labels: readonly string[];
  private readonly task: string;

  constructor(opts: {
    apiKey: string;
    /** What is being judged, e.g. "whether an insurance claim narrative is fraudulent". */
    task: string;
    labels: readonly string[];
    model?: string;
    timeoutMs?: number;
  }) {
    if (opts.labels.length < 2) {
      throw new Error('A classifier needs at least two labels');
    }
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      timeout: opts.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: 1,
    });
    this.model = opts.model ?? DEFAULT_MODEL;
    this.labels = opts.labels;
    this.task = opts.task;
  }

  async classify(text: string): Promise<Classification> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      temperature: 0,
      max_tokens: 50,
      response_format: { type: 'json_object' },
      messages: [
        {
          role: 'system',
          content:
            `You classify text: ${this.task}. ` +
            `Answer with JSON {"label": one of ${JSON.stringify(this.labels)}, ` +
            '"score": your confidence in that label between 0 and 1}.',
        },
        { role: 'user', content: text },
      ],
    });

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new Error('Classifier returned an empty completion');
    }

    const parsed = classificationSchema.parse(JSON.parse(content));
    const label = parsed.label.toUpperCase();
    if (!this.labels.includes(label)) {
      throw new Error(`Classifier returned unknown label "${parsed.label}"`);
    }
    return { label, score: parsed.score };
  }
}
