/**
 * Uniform publish capability. Each platform hides its own protocol
 * (pull-by-URL, container-then-publish, resumable upload, direct upload)
 * behind `initiate`.
 */

export const PLATFORMS = ['tiktok', 'instagram', 'youtube', 'facebook'] as const;

export type Platform = (typeof PLATFORMS)[number];

export interface PublishRequest {
  /** URL the platform (or we) can GET without credentials for the signed TTL. */
  videoUrl: string;
  caption: string;
  accessToken: string;
}

export interface PublishAttempt {
  platformPostId: string;
}

export interface PublishAdapter {
  readonly platform: Platform;
  /** Resolves once the platform accepted the video; throws on any non-2xx. */
  initiate(request: PublishRequest): Promise<PublishAttempt>;
}
