/**
 * Error taxonomy shared by the stages and the task worker.
 *
 * Anything extending NonRetryableError is dead-lettered on first failure;
 * every other error is retried with exponential backoff until the attempt
 * cap is reached.
 */
import { NonRetryableError } from './retry.js';

export { NonRetryableError };

// ── Input errors ──────────────────────────────────────────────────────────────

/** Missing Episode / Series / Script or a required field. Retrying cannot help. */
export class PipelineInputError extends NonRetryableError {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineInputError';
  }
}

/** The Episode is not in a state this stage may start from (e.g. a redelivered task). */
export class StageNotClaimableError extends NonRetryableError {
  constructor(
    readonly episodeId: string,
    readonly stage: string,
    readonly status: string,
  ) {
    super(`Episode ${episodeId} cannot start ${stage} stage from status "${status}"`);
    this.name = 'StageNotClaimableError';
  }
}

/** Another stage or a newer run claimed the Episode; this run's writes are void. */
export class StaleLeaseError extends NonRetryableError {
  constructor(readonly episodeId: string, readonly stage: string) {
    super(`Lease on episode ${episodeId} lost by ${stage} stage`);
    this.name = 'StaleLeaseError';
  }
}

export class IllegalTransitionError extends NonRetryableError {
  constructor(readonly episodeId: string, readonly from: string, readonly to: string) {
    super(`Episode ${episodeId} cannot move from "${from}" to "${to}"`);
    this.name = 'IllegalTransitionError';
  }
}

// ── Provider errors ───────────────────────────────────────────────────────────

export class ProviderError extends Error {
  constructor(readonly provider: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProviderError';
  }
}

/** The text provider returned scenes that failed validation. */
export class ScriptValidationError extends ProviderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('text', message, options);
    this.name = 'ScriptValidationError';
  }
}

/** The image provider refused the prompt on safety grounds. */
export class ContentPolicyError extends ProviderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('image', message, options);
    this.name = 'ContentPolicyError';
  }
}

export class PlatformHttpError extends Error {
  constructor(
    readonly platform: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`${platform} request failed: HTTP ${status}${body ? ` — ${body.slice(0, 500)}` : ''}`);
    this.name = 'PlatformHttpError';
  }
}

// ── Environment errors ────────────────────────────────────────────────────────

export class MediaToolMissingError extends Error {
  constructor(readonly tool: string) {
    super(
      `${tool} not found. Install it (e.g. apt install ffmpeg, brew install ffmpeg) ` +
      `or set ${tool === 'ffprobe' ? 'FFPROBE_PATH' : 'FFMPEG_PATH'} to the binary.`,
    );
    this.name = 'MediaToolMissingError';
  }
}

// ── Payload helpers ───────────────────────────────────────────────────────────

export interface ErrorPayload {
  step: string;
  message: string;
  [detail: string]: unknown;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function toErrorPayload(step: string, err: unknown): ErrorPayload {
  const payload: ErrorPayload = { step, message: errorMessage(err) };
  if (err instanceof PlatformHttpError) {
    payload['platform'] = err.platform;
    payload['status'] = err.status;
  }
  if (err instanceof ProviderError) payload['provider'] = err.provider;
  return payload;
}

export function isRetryable(err: unknown): boolean {
  return !(err instanceof NonRetryableError);
}
