/**
 * Connected social accounts. OAuth (out of scope) writes these; the publish
 * stage only reads them. `access_token` is encrypted at rest.
 */
import { z } from 'zod';
import { dbSelect, dbSelectIn } from './client.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export const SocialAccountRowSchema = z.object({
  id:           z.string(),
  workspace_id: z.string(),
  platform:     z.string(),   // tiktok | instagram | youtube | facebook
  display_name: z.string().nullable(),
  status:       z.string(),   // connected | expired | error | limited
  access_token: z.string().nullable(),
});

export type SocialAccountRecord = z.infer<typeof SocialAccountRowSchema>;

// ─── Operations ───────────────────────────────────────────────────────────────

export async function getSocialAccountById(id: string): Promise<SocialAccountRecord | null> {
  const rows = await dbSelect('social_accounts', { id });
  const row = rows[0];
  return row ? SocialAccountRowSchema.parse(row) : null;
}

/** Accounts with the given ids that belong to `workspaceId`, in the order asked for. */
export async function getWorkspaceAccountsByIds(
  workspaceId: string,
  ids: readonly string[],
): Promise<SocialAccountRecord[]> {
  const rows = await dbSelectIn('social_accounts', 'id', ids, { workspace_id: workspaceId });
  const byId = new Map(rows.map(r => {
    const account = SocialAccountRowSchema.parse(r);
    return [account.id, account] as const;
  }));
  return ids.flatMap(id => {
    const account = byId.get(id);
    return account ? [account] : [];
  });
}

export async function listConnectedAccounts(workspaceId: string): Promise<SocialAccountRecord[]> {
  const rows = await dbSelect('social_accounts', { workspace_id: workspaceId, status: 'connected' });
  return rows.map(r => SocialAccountRowSchema.parse(r));
}
