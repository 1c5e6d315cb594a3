import { createClient, type VercelKV } from '@vercel/kv';

let kv: VercelKV | null = null;

// Returns null when no KV store is configured; callers fall back to process memory.
export function getKvClient(url?: string, token?: string): VercelKV | null {
  if (kv) return kv;
  if (!url || !token) return null;
  kv = createClient({ url, token });
  return kv;
}
