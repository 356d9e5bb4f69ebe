import { Inject, Injectable, Logger } from '@nestjs/common';
import { ThreadStateConflict, type ResolutionFailureReason } from '../../common/errors/thread-errors';
import { CONVERSATION_STORE, type ConversationStore } from './conversation-store';
import { isAssigned, type AssignedPost, type ReplyConversion, type StoredPost } from './conversation.types';

export type ReplyResolution = { ok: true; ancestor: AssignedPost } | { ok: false; reason: ResolutionFailureReason };

/** `bulk_conflict`: resolvable, but the batch write lost a race with a vision promotion. */
export type UnresolvedReply = { post: StoredPost; reason: ResolutionFailureReason | 'bulk_conflict' };

export type BulkReplyAttempt = {
  converted: number;
  unresolved: UnresolvedReply[];
};

export type ReplyFailure = {
  postId: string;
  reason: ResolutionFailureReason | 'not_found';
};

export type MakeRepliesResult = {
  succeeded: number;
  failed: number;
  failures: ReplyFailure[];
};

export function resolveReplyTarget(post: StoredPost, target: StoredPost | null | undefined): ReplyResolution {
  if (post.assignment.kind === 'thread_root') return { ok: false, reason: 'already_thread_root' };
  if (!post.inReplyToExternalId) return { ok: false, reason: 'no_reply_target' };
  if (!target) return { ok: false, reason: 'target_not_found' };
  if (!isAssigned(target)) return { ok: false, reason: 'target_unassigned' };
  return { ok: true, ancestor: target };
}

@Injectable()
export class ThreadConversionService {
  private readonly logger = new Logger(ThreadConversionService.name);

  constructor(@Inject(CONVERSATION_STORE) private readonly store: ConversationStore) {}

  /** Every selected post becomes a vision. Unknown ids are ignored. */
  async makeVisions(postIds: readonly string[]): Promise<{ converted: number }> {
    const posts = await this.store.getPostsByIds(postIds);
    const converted = await this.store.markManyAsThreadRoots(posts);
    this.logger.log(`Converted ${converted} post(s) to visions`);
    return { converted };
  }

  /**
   * One store write for every post whose reply target is already a vision or reply.
   * The rest come back with the reason they could not be attached.
   */
  async tryBulkConvertReplies(posts: readonly StoredPost[]): Promise<BulkReplyAttempt> {
    const targetIds = posts.map((p) => p.inReplyToExternalId).filter((id): id is string => Boolean(id));
    const targets = new Map((await this.store.getPostsByExternalIds(targetIds)).map((t) => [t.externalId, t] as const));

    const ready: ReplyConversion[] = [];
    const unresolved: UnresolvedReply[] = [];
    for (const post of posts) {
      const res = resolveReplyTarget(post, post.inReplyToExternalId ? targets.get(post.inReplyToExternalId) : null);
      if (res.ok) ready.push({ post, ancestor: res.ancestor });
      else unresolved.push({ post, reason: res.reason });
    }

    if (ready.length === 0) return { converted: 0, unresolved };
    try {
      return { converted: await this.store.markManyAsThreadReplies(ready), unresolved };
    } catch (err) {
      if (!(err instanceof ThreadStateConflict)) throw err;
      this.logger.warn(`Bulk reply write conflicted on post ${err.postId}; retrying ${ready.length} post(s) one by one`);
      return { converted: 0, unresolved: [...unresolved, ...ready.map(({ post }) => ({ post, reason: 'bulk_conflict' as const }))] };
    }
  }

  /** Single-post conversion with a fresh target lookup. */
  async convertReply(post: StoredPost): Promise<ReplyResolution> {
    const target = post.inReplyToExternalId ? await this.store.getPostByExternalId(post.inReplyToExternalId) : null;
    const res = resolveReplyTarget(post, target);
    if (!res.ok) return res;
    try {
      await this.store.markAsThreadReply(post, res.ancestor);
    } catch (err) {
      if (err instanceof ThreadStateConflict) return { ok: false, reason: 'already_thread_root' };
      throw err;
    }
    return res;
  }

  /**
   * Bulk first, then one-by-one over the posts the bulk pass could not attach.
   * Oldest first, so a reply to a reply converted earlier in the same batch resolves.
   * `succeeded + failed` always equals the number of distinct ids given.
   */
  async makeReplies(postIds: readonly string[]): Promise<MakeRepliesResult> {
    const ids = Array.from(new Set(postIds));
    const posts = await this.store.getPostsByIds(ids);
    const found = new Set(posts.map((p) => p.id));
    const failures: ReplyFailure[] = ids.filter((id) => !found.has(id)).map((postId) => ({ postId, reason: 'not_found' }));

    const bulk = await this.tryBulkConvertReplies(posts);
    let succeeded = bulk.converted;

    const pending = [...bulk.unresolved].sort((a, b) => a.post.receivedAt.getTime() - b.post.receivedAt.getTime());
    for (const { post } of pending) {
      const res = await this.convertReply(post);
      if (res.ok) succeeded++;
      else failures.push({ postId: post.id, reason: res.reason });
    }

    if (failures.length > 0) {
      this.logger.warn(`Converted ${succeeded} post(s) to replies; ${failures.length} still need a target`);
    } else {
      this.logger.log(`Converted ${succeeded} post(s) to replies`);
    }
    return { succeeded, failed: failures.length, failures };
  }
}
