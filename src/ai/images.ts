/**
 * Still image generation — OpenAI Images, portrait 1024x1792.
 */
import OpenAI from 'openai';
import { env } from '../config.js';
import { ContentPolicyError, errorMessage, ProviderError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { openaiClient } from './claude.js';

function isContentPolicyRefusal(err: unknown): boolean {
  if (err instanceof OpenAI.APIError && err.code === 'content_policy_violation') return true;
  const message = errorMessage(err).toLowerCase();
  return message.includes('content_policy_violation') || message.includes('safety system');
}

/** PNG bytes for `prompt`. Safety refusals surface as ContentPolicyError. */
export async function generateImage(prompt: string): Promise<Buffer> {
  logger.debug('Images: generating', { chars: prompt.length });
  try {
    const res = await openaiClient().images.generate({
      model: env.OPENAI_IMAGE_MODEL,
      prompt,
      size: '1024x1792',
      n: 1,
      response_format: 'b64_json',
    });
    const b64 = res.data[0]?.b64_json;
    if (!b64) throw new ProviderError('image', 'Image response contained no data');
    return Buffer.from(b64, 'base64');
  } catch (err) {
    if (err instanceof ProviderError) throw err;
    if (isContentPolicyRefusal(err)) {
      throw new ContentPolicyError(`Image prompt refused: ${errorMessage(err)}`, { cause: err });
    }
    throw new ProviderError('image', `Image generation failed: ${errorMessage(err)}`, { cause: err });
  }
}
