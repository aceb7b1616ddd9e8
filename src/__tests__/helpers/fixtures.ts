/**
 * Row builders for the in-memory database. Every builder returns the parsed
 * record so tests can read ids and fields without casts.
 */
import { AssetRowSchema, type AssetRecord } from '../../db/assets.js';
import { EpisodeRowSchema, type EpisodeRecord } from '../../db/episodes.js';
import { PostRowSchema, type PostRecord } from '../../db/posts.js';
import { ScriptRowSchema, type ScriptRecord } from '../../db/scripts.js';
import { SeriesRowSchema, type SeriesRecord } from '../../db/series.js';
import { SocialAccountRowSchema, type SocialAccountRecord } from '../../db/social-accounts.js';
import { encryptToken } from '../../security/token-crypto.js';
import { seedRow } from './memory-db.js';

export const WORKSPACE_ID = 'ws-1';

export function seedSeries(overrides: Partial<SeriesRecord> = {}): SeriesRecord {
  return SeriesRowSchema.parse(seedRow('series', {
    workspace_id:                 WORKSPACE_ID,
    name:                         'Morning Stoic',
    content_type:                 'motivation',
    custom_topic:                 null,
    script_preferences:           { storyLength: '30_40', tone: 'calm' },
    voice_language:               { languageCode: 'en-US', gender: 'female', style: 'warm' },
    music_settings:               null,
    art_style:                    { style: 'cinematic_ai' },
    caption_style:                null,
    visual_effects:               [],
    schedule:                     { frequency: 'daily', publishTime: '09:00', timezone: 'UTC' },
    connected_social_account_ids: [],
    status:                       'active',
    auto_post_enabled:            false,
    estimated_credits_per_video:  null,
    ...overrides,
  }));
}

export function seedEpisode(seriesId: string, overrides: Partial<EpisodeRecord> = {}): EpisodeRecord {
  return EpisodeRowSchema.parse(seedRow('episodes', {
    series_id:       seriesId,
    sequence_number: 1,
    scheduled_at:    '2026-05-01T09:00:00.000Z',
    status:          'scheduled',
    script_id:       null,
    video_asset_id:  null,
    preview_url:     null,
    error:           null,
    media_manifest:  null,
    credits_used:    0,
    lease_stage:     null,
    lease_task_id:   null,
    lease_version:   0,
    ...overrides,
  }));
}

export function seedScript(seriesId: string, overrides: Partial<ScriptRecord> = {}): ScriptRecord {
  return ScriptRowSchema.parse(seedRow('scripts', {
    series_id:       seriesId,
    language_code:   'en-US',
    text:            'Breathe in. Begin again.',
    scenes:          null,
    prompt_metadata: null,
    ...overrides,
  }));
}

export function seedAsset(overrides: Partial<AssetRecord> = {}): AssetRecord {
  return AssetRowSchema.parse(seedRow('assets', {
    workspace_id:     WORKSPACE_ID,
    type:             'video',
    source:           'generated',
    url:              'https://res.cloudinary.com/demo/video/upload/v1/series-autopilot/video.mp4',
    format:           'video/mp4',
    duration_seconds: null,
    metadata:         null,
    ...overrides,
  }));
}

export function seedAccount(overrides: Partial<SocialAccountRecord> = {}): SocialAccountRecord {
  return SocialAccountRowSchema.parse(seedRow('social_accounts', {
    workspace_id: WORKSPACE_ID,
    platform:     'tiktok',
    display_name: 'Test account',
    status:       'connected',
    access_token: encryptToken('test-access-token', 'test-secret'),
    ...overrides,
  }));
}

export function seedPost(episodeId: string, accountId: string, overrides: Partial<PostRecord> = {}): PostRecord {
  return PostRowSchema.parse(seedRow('posts', {
    episode_id:        episodeId,
    social_account_id: accountId,
    platform_post_id:  null,
    status:            'pending',
    error:             null,
    posted_at:         null,
    ...overrides,
  }));
}
