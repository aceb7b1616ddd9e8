/**
 * Voice synthesis — OpenAI TTS.
 * Use only from pipeline/producer.ts.
 */
import { env, PIPELINE } from '../config.js';
import type { VoiceLanguage } from '../db/series.js';
import { errorMessage, ProviderError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { openaiClient } from './claude.js';

export type TtsVoice = 'alloy' | 'echo' | 'fable' | 'onyx' | 'nova' | 'shimmer';

/**
 * Maps the series voice settings onto a provider voice. "female" is checked
 * first because it contains "male".
 */
export function voiceIdFor(voice: VoiceLanguage | null | undefined): TtsVoice {
  const gender = (voice?.gender ?? '').toLowerCase();
  const style = (voice?.style ?? '').toLowerCase();
  if (gender.includes('female')) return style.includes('warm') ? 'nova' : 'shimmer';
  if (gender.includes('male')) return style.includes('deep') ? 'onyx' : 'echo';
  return 'alloy';
}

/** MP3 bytes for `text`, truncated to the provider's input limit. */
export async function synthesizeSpeech(text: string, voice: TtsVoice): Promise<Buffer> {
  const input = text.slice(0, PIPELINE.ttsInputMax);
  logger.debug('Voice: synthesizing', { voice, chars: input.length });
  try {
    const res = await openaiClient().audio.speech.create({
      model: env.OPENAI_TTS_MODEL,
      voice,
      input,
      response_format: 'mp3',
    });
    return Buffer.from(await res.arrayBuffer());
  } catch (err) {
    throw new ProviderError('tts', `Speech synthesis failed: ${errorMessage(err)}`, { cause: err });
  }
}
