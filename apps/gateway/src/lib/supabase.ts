import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

export const apiKeyRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  key: z.string(),
  name: z.string(),
  rate_limit: z.number().nullable().optional(),
  is_active: z.boolean(),
  last_used_at: z.string().nullable().optional(),
});

export type ApiKey = z.infer<typeof apiKeyRowSchema>;

/** Service-role client; sessions are never persisted on the gateway. */
export function createSupabaseClient(url: string, serviceKey: string): SupabaseClient {
  return createClient(url, serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}
