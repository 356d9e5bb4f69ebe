import type { ConversationStore, UpsertPostResult } from '../../src/modules/conversations/conversation-store';
import {
  visionIdOf,
  type AssignedPost,
  type PostAssignment,
  type PostPayload,
  type ReplyConversion,
  type StoredPost,
  type ThreadReply,
  type ThreadRoot,
} from '../../src/modules/conversations/conversation.types';
import { ThreadStateConflict } from '../../src/common/errors/thread-errors';

type PostRecord = {
  id: string;
  externalId: string;
  payload: PostPayload;
  seq: number;
};

/** Map-backed store keyed by external id; mirrors the Postgres store's contract. */
export class InMemoryConversationStore implements ConversationStore {
  private readonly posts = new Map<string, PostRecord>();
  private readonly roots = new Map<string, ThreadRoot>(); // by postId
  private readonly replies = new Map<string, ThreadReply>(); // by postId
  private nextId = 1;
  private seq = 0;

  readonly calls = {
    markManyAsThreadReplies: 0,
    markAsThreadReply: 0,
  };

  private id(prefix: string) {
    return `${prefix}_${this.nextId++}`;
  }

  private assignmentOf(postId: string): PostAssignment {
    const root = this.roots.get(postId);
    if (root) return { kind: 'thread_root', visionId: root.id };
    const reply = this.replies.get(postId);
    if (reply) return { kind: 'thread_reply', replyId: reply.id, visionId: reply.visionId };
    return { kind: 'unassigned' };
  }

  private toStored(rec: PostRecord): StoredPost {
    return {
      id: rec.id,
      externalId: rec.externalId,
      author: { ...rec.payload.author },
      text: rec.payload.text,
      inReplyToExternalId: rec.payload.inReplyToExternalId,
      receivedAt: rec.payload.receivedAt,
      assignment: this.assignmentOf(rec.id),
    };
  }

  private byId(id: string): PostRecord | undefined {
    for (const rec of this.posts.values()) if (rec.id === id) return rec;
    return undefined;
  }

  private parentIsAssigned(rec: PostRecord): boolean {
    const parentId = rec.payload.inReplyToExternalId;
    const parent = parentId === null ? undefined : this.posts.get(parentId);
    return parent !== undefined && this.assignmentOf(parent.id).kind !== 'unassigned';
  }

  get size(): number {
    return this.posts.size;
  }

  async upsertPost(externalId: string, payload: PostPayload): Promise<UpsertPostResult> {
    const existing = this.posts.get(externalId);
    if (existing) {
      existing.payload = payload;
      existing.seq = ++this.seq;
      return { post: this.toStored(existing), created: false };
    }
    const rec: PostRecord = { id: this.id('post'), externalId, payload, seq: ++this.seq };
    this.posts.set(externalId, rec);
    return { post: this.toStored(rec), created: true };
  }

  async getPostByExternalId(externalId: string): Promise<StoredPost | null> {
    const rec = this.posts.get(externalId);
    return rec ? this.toStored(rec) : null;
  }

  async getPostsByExternalIds(externalIds: readonly string[]): Promise<StoredPost[]> {
    const out: StoredPost[] = [];
    for (const id of new Set(externalIds)) {
      const rec = this.posts.get(id);
      if (rec) out.push(this.toStored(rec));
    }
    return out;
  }

  async getPostsByIds(ids: readonly string[]): Promise<StoredPost[]> {
    const out: StoredPost[] = [];
    for (const id of new Set(ids)) {
      const rec = this.byId(id);
      if (rec) out.push(this.toStored(rec));
    }
    return out;
  }

  async deletePostByExternalId(externalId: string): Promise<boolean> {
    const rec = this.posts.get(externalId);
    if (!rec) return false;
    this.posts.delete(externalId);
    const root = this.roots.get(rec.id);
    this.roots.delete(rec.id);
    this.replies.delete(rec.id);
    if (root) {
      for (const [postId, reply] of this.replies) if (reply.visionId === root.id) this.replies.delete(postId);
    }
    return true;
  }

  async recentPosts(limit: number): Promise<StoredPost[]> {
    return Array.from(this.posts.values())
      .sort((a, b) => b.payload.receivedAt.getTime() - a.payload.receivedAt.getTime() || b.seq - a.seq)
      .slice(0, Math.max(0, limit))
      .map((rec) => this.toStored(rec));
  }

  async listUnassignedReplies(limit: number): Promise<StoredPost[]> {
    return Array.from(this.posts.values())
      .filter((rec) => this.assignmentOf(rec.id).kind === 'unassigned' && this.parentIsAssigned(rec))
      .sort((a, b) => a.payload.receivedAt.getTime() - b.payload.receivedAt.getTime() || a.seq - b.seq)
      .slice(0, Math.max(0, limit))
      .map((rec) => this.toStored(rec));
  }

  async markAsThreadRoot(post: StoredPost): Promise<ThreadRoot> {
    const existing = this.roots.get(post.id);
    if (existing) return existing;
    this.replies.delete(post.id);
    const root: ThreadRoot = {
      id: this.id('vision'),
      postId: post.id,
      authorId: post.author.externalId,
      text: post.text,
      categoryId: null,
      featured: false,
    };
    this.roots.set(post.id, root);
    return root;
  }

  async markManyAsThreadRoots(posts: readonly StoredPost[]): Promise<number> {
    const ids = new Set<string>();
    for (const p of posts) {
      await this.markAsThreadRoot(p);
      ids.add(p.id);
    }
    return ids.size;
  }

  async markAsThreadReply(post: StoredPost, ancestor: AssignedPost): Promise<ThreadReply> {
    this.calls.markAsThreadReply++;
    if (this.roots.has(post.id)) throw new ThreadStateConflict(post.id, `Post ${post.id} is already a vision`);
    const existing = this.replies.get(post.id);
    const reply: ThreadReply = { id: existing?.id ?? this.id('reply'), postId: post.id, visionId: visionIdOf(ancestor) };
    this.replies.set(post.id, reply);
    return reply;
  }

  async markManyAsThreadReplies(conversions: readonly ReplyConversion[]): Promise<number> {
    this.calls.markManyAsThreadReplies++;
    const conflict = conversions.find((c) => this.roots.has(c.post.id));
    if (conflict) throw new ThreadStateConflict(conflict.post.id, `Post ${conflict.post.id} is already a vision`);
    const ids = new Set<string>();
    for (const c of conversions) {
      const existing = this.replies.get(c.post.id);
      this.replies.set(c.post.id, { id: existing?.id ?? this.id('reply'), postId: c.post.id, visionId: visionIdOf(c.ancestor) });
      ids.add(c.post.id);
    }
    return ids.size;
  }
}
