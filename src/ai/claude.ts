/**
 * Text generation — Anthropic Claude primary, OpenAI chat fallback.
 * Script writing goes through here. Never import Anthropic/OpenAI directly in stages.
 */
import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { env } from '../config.js';
import { errorMessage, ProviderError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

let anthropic: Anthropic | null = null;
let openai: OpenAI | null = null;

function anthropicClient(): Anthropic {
  anthropic ??= new Anthropic({ apiKey: env.ANTHROPIC_API_KEY });
  return anthropic;
}

export function openaiClient(): OpenAI {
  openai ??= new OpenAI({ apiKey: env.OPENAI_API_KEY });
  return openai;
}

// ── Public interface ──────────────────────────────────────────────────────────

export interface TextRequest {
  system: string;
  prompt: string;
  maxTokens?: number;
  temperature?: number;
}

export interface TextResult {
  text: string;
  provider: 'anthropic' | 'openai';
  model: string;
}

function isProviderOutage(err: unknown): boolean {
  if (err instanceof Anthropic.APIConnectionError) return true;
  return err instanceof Anthropic.APIError && (err.status ?? 0) >= 500;
}

export async function generateText(req: TextRequest): Promise<TextResult> {
  const maxTokens = req.maxTokens ?? 4_000;
  const temperature = req.temperature ?? 0.8;

  try {
    const res = await anthropicClient().messages.create({
      model: env.ANTHROPIC_MODEL,
      max_tokens: maxTokens,
      temperature,
      system: req.system,
      messages: [{ role: 'user', content: req.prompt }],
    });
    logger.debug('claude.generateText complete', {
      inputTokens: res.usage.input_tokens,
      outputTokens: res.usage.output_tokens,
    });
    for (const block of res.content) {
      if (block.type === 'text') return { text: block.text, provider: 'anthropic', model: env.ANTHROPIC_MODEL };
    }
    throw new ProviderError('text', 'Anthropic response contained no text block');
  } catch (err) {
    if (isProviderOutage(err)) {
      logger.warn('Anthropic unavailable — falling back to OpenAI', { error: errorMessage(err) });
      return openAiText(req, maxTokens, temperature);
    }
    if (err instanceof ProviderError) throw err;
    throw new ProviderError('text', `Anthropic request failed: ${errorMessage(err)}`, { cause: err });
  }
}

async function openAiText(req: TextRequest, maxTokens: number, temperature: number): Promise<TextResult> {
  try {
    const res = await openaiClient().chat.completions.create({
      model: env.OPENAI_TEXT_MODEL,
      max_tokens: maxTokens,
      temperature,
      messages: [
        { role: 'system', content: req.system },
        { role: 'user', content: req.prompt },
      ],
    });
    const text = res.choices[0]?.message?.content;
    if (!text) throw new ProviderError('text', 'OpenAI response was empty');
    return { text, provider: 'openai', model: env.OPENAI_TEXT_MODEL };
  } catch (err) {
    if (err instanceof ProviderError) throw err;
    throw new ProviderError('text', `OpenAI request failed: ${errorMessage(err)}`, { cause: err });
  }
}
