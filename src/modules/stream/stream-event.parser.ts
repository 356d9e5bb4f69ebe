import { z } from 'zod';
import type { StreamEvent } from './stream.types';

const disconnectSchema = z.object({
  disconnect: z.object({
    code: z.coerce.number().int().optional(),
    reason: z.string().optional(),
  }),
});

const deleteSchema = z.object({
  delete: z.object({
    status: z.object({ id_str: z.string().min(1) }),
  }),
});

const postSchema = z.object({
  id_str: z.string().min(1),
  text: z.string().optional(),
  full_text: z.string().optional(),
  extended_tweet: z.object({ full_text: z.string() }).partial().optional(),
  in_reply_to_status_id_str: z.string().nullish(),
  retweeted_status: z.unknown().optional(),
  user: z.object({
    id_str: z.string().min(1),
    screen_name: z.string(),
    name: z.string().nullish(),
  }),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decodes one provider record. Returns null for shapes the pipeline ignores
 * (limit notices, stall warnings, friends lists).
 */
export function parseStreamEvent(raw: unknown, receivedAt: Date = new Date()): StreamEvent | null {
  if (!isRecord(raw)) return null;

  const disconnect = disconnectSchema.safeParse(raw);
  if (disconnect.success) {
    return {
      kind: 'disconnect',
      reason: disconnect.data.disconnect.reason ?? 'unknown',
      code: disconnect.data.disconnect.code ?? null,
    };
  }

  const del = deleteSchema.safeParse(raw);
  if (del.success) return { kind: 'delete', externalId: del.data.delete.status.id_str };

  const post = postSchema.safeParse(raw);
  if (!post.success) return null;
  const p = post.data;
  const text = p.extended_tweet?.full_text ?? p.full_text ?? p.text ?? '';

  return {
    kind: 'post',
    reshare: p.retweeted_status !== undefined && p.retweeted_status !== null,
    post: {
      externalId: p.id_str,
      author: { externalId: p.user.id_str, screenName: p.user.screen_name, name: p.user.name ?? p.user.screen_name },
      text,
      inReplyToExternalId: p.in_reply_to_status_id_str || null,
      raw,
      receivedAt,
    },
  };
}
