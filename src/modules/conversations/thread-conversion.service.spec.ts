import { InMemoryConversationStore } from '../../../test/support/in-memory-conversation-store';
import { at, payload, seedReply, seedRoot } from '../../../test/support/fixtures';
import type { StoredPost } from './conversation.types';
import { resolveReplyTarget, ThreadConversionService } from './thread-conversion.service';

async function candidate(store: InMemoryConversationStore, externalId: string, inReplyTo: string | null, minute = 0) {
  const { post } = await store.upsertPost(externalId, payload({ inReplyToExternalId: inReplyTo, receivedAt: at(minute) }));
  return post;
}

/** Promotes one post to a vision right after handing out its snapshot. */
class PromotingStore extends InMemoryConversationStore {
  constructor(private promoteOnRead: string | null) {
    super();
  }

  override async getPostsByIds(ids: readonly string[]): Promise<StoredPost[]> {
    const posts = await super.getPostsByIds(ids);
    const target = posts.find((p) => p.externalId === this.promoteOnRead);
    if (target) {
      this.promoteOnRead = null;
      await this.markAsThreadRoot(target);
    }
    return posts;
  }
}

async function assignmentOf(store: InMemoryConversationStore, externalId: string) {
  return (await store.getPostByExternalId(externalId))?.assignment.kind;
}

describe('resolveReplyTarget', () => {
  const base: StoredPost = {
    id: 'post_1',
    externalId: '1',
    author: { externalId: 'u1', screenName: 'alice', name: 'Alice' },
    text: 'hi',
    inReplyToExternalId: '2',
    receivedAt: at(0),
    assignment: { kind: 'unassigned' },
  };
  const target: StoredPost = { ...base, id: 'post_2', externalId: '2', inReplyToExternalId: null };

  it('rejects posts that are already visions', () => {
    expect(resolveReplyTarget({ ...base, assignment: { kind: 'thread_root', visionId: 'v1' } }, target)).toEqual({
      ok: false,
      reason: 'already_thread_root',
    });
  });

  it('rejects posts without a reply target', () => {
    expect(resolveReplyTarget({ ...base, inReplyToExternalId: null }, null)).toEqual({ ok: false, reason: 'no_reply_target' });
  });

  it('rejects missing and unassigned targets', () => {
    expect(resolveReplyTarget(base, null)).toEqual({ ok: false, reason: 'target_not_found' });
    expect(resolveReplyTarget(base, target)).toEqual({ ok: false, reason: 'target_unassigned' });
  });

  it('accepts a target that belongs to a thread', () => {
    const assigned = { ...target, assignment: { kind: 'thread_root' as const, visionId: 'v1' } };
    expect(resolveReplyTarget(base, assigned)).toEqual({ ok: true, ancestor: assigned });
  });
});

describe('ThreadConversionService', () => {
  it('makeVisions converts every known post and ignores unknown ids', async () => {
    const store = new InMemoryConversationStore();
    const a = await candidate(store, 'a', null);
    const b = await candidate(store, 'b', 'elsewhere');
    const svc = new ThreadConversionService(store);

    await expect(svc.makeVisions([a.id, b.id, a.id, 'post_missing'])).resolves.toEqual({ converted: 2 });
    expect(await assignmentOf(store, 'a')).toBe('thread_root');
    expect(await assignmentOf(store, 'b')).toBe('thread_root');
  });

  it('makeVisions turns a reply into a vision', async () => {
    const store = new InMemoryConversationStore();
    await seedRoot(store, 'root');
    const reply = await seedReply(store, 'r1', 'root');
    const svc = new ThreadConversionService(store);

    await svc.makeVisions([reply.id]);
    expect(await assignmentOf(store, 'r1')).toBe('thread_root');
  });

  it('makeReplies converts a fully resolvable batch in one store call', async () => {
    const store = new InMemoryConversationStore();
    await seedRoot(store, 'root');
    const a = await candidate(store, 'a', 'root');
    const b = await candidate(store, 'b', 'root');
    const svc = new ThreadConversionService(store);

    await expect(svc.makeReplies([a.id, b.id])).resolves.toEqual({ succeeded: 2, failed: 0, failures: [] });
    expect(store.calls.markManyAsThreadReplies).toBe(1);
    expect(store.calls.markAsThreadReply).toBe(0);
    expect(await assignmentOf(store, 'a')).toBe('thread_reply');
  });

  it('makeReplies keeps the valid members when some cannot be attached', async () => {
    const store = new InMemoryConversationStore();
    await seedRoot(store, 'root');
    const ok = await candidate(store, 'ok', 'root', 1);
    const orphan = await candidate(store, 'orphan', 'never-seen', 2);
    const topLevel = await candidate(store, 'top', null, 3);
    const svc = new ThreadConversionService(store);

    const ids = [ok.id, orphan.id, topLevel.id, 'post_missing'];
    const res = await svc.makeReplies(ids);

    expect(res.succeeded).toBe(1);
    expect(res.failed).toBe(3);
    expect(res.succeeded + res.failed).toBe(ids.length);
    expect(res.failures).toEqual([
      { postId: 'post_missing', reason: 'not_found' },
      { postId: orphan.id, reason: 'target_not_found' },
      { postId: topLevel.id, reason: 'no_reply_target' },
    ]);
    expect(await assignmentOf(store, 'ok')).toBe('thread_reply');
    expect(await assignmentOf(store, 'orphan')).toBe('unassigned');
  });

  it('makeReplies resolves chains whose parent is converted earlier in the same batch', async () => {
    const store = new InMemoryConversationStore();
    const root = await seedRoot(store, 'root');
    const child = await candidate(store, 'child', 'root', 1);
    const grandchild = await candidate(store, 'grandchild', 'child', 2);
    const svc = new ThreadConversionService(store);

    const res = await svc.makeReplies([grandchild.id, child.id]);

    expect(res).toEqual({ succeeded: 2, failed: 0, failures: [] });
    expect(store.calls.markAsThreadReply).toBe(1);
    const stored = await store.getPostByExternalId('grandchild');
    expect(stored?.assignment).toEqual({ kind: 'thread_reply', replyId: expect.any(String), visionId: root.assignment.visionId });
  });

  it('makeReplies reports visions in the batch as failures', async () => {
    const store = new InMemoryConversationStore();
    await seedRoot(store, 'root');
    const vision = await seedRoot(store, 'other', { inReplyToExternalId: 'root' });
    const svc = new ThreadConversionService(store);

    await expect(svc.makeReplies([vision.id])).resolves.toEqual({
      succeeded: 0,
      failed: 1,
      failures: [{ postId: vision.id, reason: 'already_thread_root' }],
    });
    expect(await assignmentOf(store, 'other')).toBe('thread_root');
  });

  it('makeReplies falls back per post when a member becomes a vision during the bulk write', async () => {
    const store = new PromotingStore('late');
    await seedRoot(store, 'root');
    const late = await candidate(store, 'late', 'root', 1);
    const fine = await candidate(store, 'fine', 'root', 2);
    const svc = new ThreadConversionService(store);

    await expect(svc.makeReplies([late.id, fine.id])).resolves.toEqual({
      succeeded: 1,
      failed: 1,
      failures: [{ postId: late.id, reason: 'already_thread_root' }],
    });
    expect(store.calls.markManyAsThreadReplies).toBe(1);
    expect(store.calls.markAsThreadReply).toBe(2);
    expect(await assignmentOf(store, 'late')).toBe('thread_root');
    expect(await assignmentOf(store, 'fine')).toBe('thread_reply');
  });

  it('tryBulkConvertReplies hands the whole ready set back after a write conflict', async () => {
    const store = new InMemoryConversationStore();
    await seedRoot(store, 'root');
    const stale = await candidate(store, 'stale', 'root', 1);
    const other = await candidate(store, 'other', 'root', 2);
    await store.markAsThreadRoot(stale);
    const svc = new ThreadConversionService(store);

    const res = await svc.tryBulkConvertReplies([stale, other]);

    expect(res.converted).toBe(0);
    expect(res.unresolved.map((u) => [u.post.externalId, u.reason])).toEqual([
      ['stale', 'bulk_conflict'],
      ['other', 'bulk_conflict'],
    ]);
  });

  it('makeReplies counts each distinct id once', async () => {
    const store = new InMemoryConversationStore();
    await seedRoot(store, 'root');
    const a = await candidate(store, 'a', 'root');
    const svc = new ThreadConversionService(store);

    await expect(svc.makeReplies([a.id, a.id, a.id])).resolves.toEqual({ succeeded: 1, failed: 0, failures: [] });
  });

  it('tryBulkConvertReplies returns the unresolved members with their reason', async () => {
    const store = new InMemoryConversationStore();
    await seedRoot(store, 'root');
    const a = await candidate(store, 'a', 'root');
    const b = await candidate(store, 'b', 'a');
    const svc = new ThreadConversionService(store);

    const res = await svc.tryBulkConvertReplies([a, b]);
    expect(res.converted).toBe(1);
    expect(res.unresolved.map((u) => [u.post.externalId, u.reason])).toEqual([['b', 'target_unassigned']]);
  });
});
