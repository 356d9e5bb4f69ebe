import { Injectable } from '@nestjs/common';
import { Kysely, sql } from 'kysely';
import { randomUUID } from 'node:crypto';
import { ThreadStateConflict } from '../../common/errors/thread-errors';
import type { DatabaseSchema, VisionRow } from '../database/database.schema';
import { DatabaseService } from '../database/database.service';
import type { ConversationStore, UpsertPostResult } from './conversation-store';
import {
  visionIdOf,
  type AssignedPost,
  type PostAssignment,
  type PostAuthor,
  type PostPayload,
  type ReplyConversion,
  type StoredPost,
  type ThreadReply,
  type ThreadRoot,
} from './conversation.types';

type Db = Kysely<DatabaseSchema>;

type PostAssignmentRow = {
  id: string;
  externalId: string;
  authorExternalId: string;
  authorScreenName: string;
  authorName: string;
  text: string;
  inReplyToExternalId: string | null;
  receivedAt: Date;
  visionId: string | null;
  replyId: string | null;
  replyVisionId: string | null;
};

function toAssignment(row: PostAssignmentRow): PostAssignment {
  if (row.visionId) return { kind: 'thread_root', visionId: row.visionId };
  if (row.replyId && row.replyVisionId) return { kind: 'thread_reply', replyId: row.replyId, visionId: row.replyVisionId };
  return { kind: 'unassigned' };
}

function toStoredPost(row: PostAssignmentRow): StoredPost {
  return {
    id: row.id,
    externalId: row.externalId,
    author: { externalId: row.authorExternalId, screenName: row.authorScreenName, name: row.authorName },
    text: row.text,
    inReplyToExternalId: row.inReplyToExternalId,
    receivedAt: new Date(row.receivedAt),
    assignment: toAssignment(row),
  };
}

function toThreadRoot(row: VisionRow): ThreadRoot {
  return {
    id: row.id,
    postId: row.postId,
    authorId: row.authorId,
    text: row.text,
    categoryId: row.categoryId,
    featured: row.featured,
  };
}

function uniqueById<T extends { id: string }>(items: readonly T[]): T[] {
  const byId = new Map<string, T>();
  for (const item of items) byId.set(item.id, item);
  return Array.from(byId.values());
}

@Injectable()
export class KyselyConversationStore implements ConversationStore {
  constructor(private readonly db: DatabaseService) {}

  private selectPosts(db: Db = this.db) {
    return db
      .selectFrom('post')
      .leftJoin('vision', 'vision.postId', 'post.id')
      .leftJoin('reply', 'reply.postId', 'post.id')
      .select([
        'post.id as id',
        'post.externalId as externalId',
        'post.authorExternalId as authorExternalId',
        'post.authorScreenName as authorScreenName',
        'post.authorName as authorName',
        'post.text as text',
        'post.inReplyToExternalId as inReplyToExternalId',
        'post.receivedAt as receivedAt',
        'vision.id as visionId',
        'reply.id as replyId',
        'reply.visionId as replyVisionId',
      ]);
  }

  /** Stream sightings refresh the handle and display name; profile fields belong to the refresher. */
  private async upsertAuthor(db: Db, author: PostAuthor, now: Date): Promise<void> {
    await db
      .insertInto('user')
      .values({
        id: randomUUID(),
        externalId: author.externalId,
        screenName: author.screenName,
        name: author.name,
        profileImageUrl: null,
        description: null,
        location: null,
        followersCount: null,
        profileRefreshedAt: null,
        updatedAt: now,
      })
      .onConflict((oc) =>
        oc.column('externalId').doUpdateSet({ screenName: author.screenName, name: author.name, updatedAt: now }),
      )
      .execute();
  }

  private async authorIdsFor(db: Db, posts: readonly StoredPost[]): Promise<Map<string, string>> {
    const now = new Date();
    const authors = new Map<string, PostAuthor>();
    for (const p of posts) authors.set(p.author.externalId, p.author);
    if (authors.size === 0) return new Map();

    await db
      .insertInto('user')
      .values(
        Array.from(authors.values()).map((a) => ({
          id: randomUUID(),
          externalId: a.externalId,
          screenName: a.screenName,
          name: a.name,
          profileImageUrl: null,
          description: null,
          location: null,
          followersCount: null,
          profileRefreshedAt: null,
          updatedAt: now,
        })),
      )
      .onConflict((oc) => oc.column('externalId').doNothing())
      .execute();

    const rows = await db
      .selectFrom('user')
      .select(['id', 'externalId'])
      .where('externalId', 'in', Array.from(authors.keys()))
      .execute();
    return new Map(rows.map((r) => [r.externalId, r.id] as const));
  }

  async upsertPost(externalId: string, payload: PostPayload): Promise<UpsertPostResult> {
    return await this.db.transaction().execute(async (trx) => {
      const now = new Date();
      await this.upsertAuthor(trx, payload.author, now);

      const fields = {
        authorExternalId: payload.author.externalId,
        authorScreenName: payload.author.screenName,
        authorName: payload.author.name,
        text: payload.text,
        inReplyToExternalId: payload.inReplyToExternalId,
        raw: JSON.stringify(payload.raw),
        receivedAt: payload.receivedAt,
        updatedAt: now,
      };
      const written = await trx
        .insertInto('post')
        .values({ id: randomUUID(), externalId, ...fields })
        .onConflict((oc) => oc.column('externalId').doUpdateSet(fields))
        // xmax is 0 only for rows inserted by this statement.
        .returning(['id', sql<boolean>`(xmax = 0)`.as('created')])
        .executeTakeFirstOrThrow();

      const row = await this.selectPosts(trx).where('post.id', '=', written.id).executeTakeFirstOrThrow();
      return { post: toStoredPost(row), created: written.created };
    });
  }

  async getPostByExternalId(externalId: string): Promise<StoredPost | null> {
    const row = await this.selectPosts().where('post.externalId', '=', externalId).executeTakeFirst();
    return row ? toStoredPost(row) : null;
  }

  async getPostsByExternalIds(externalIds: readonly string[]): Promise<StoredPost[]> {
    const ids = Array.from(new Set(externalIds));
    if (ids.length === 0) return [];
    const rows = await this.selectPosts().where('post.externalId', 'in', ids).execute();
    return rows.map(toStoredPost);
  }

  async getPostsByIds(ids: readonly string[]): Promise<StoredPost[]> {
    const unique = Array.from(new Set(ids));
    if (unique.length === 0) return [];
    const rows = await this.selectPosts().where('post.id', 'in', unique).execute();
    return rows.map(toStoredPost);
  }

  async deletePostByExternalId(externalId: string): Promise<boolean> {
    const res = await this.db.deleteFrom('post').where('externalId', '=', externalId).executeTakeFirst();
    return res.numDeletedRows > 0n;
  }

  async recentPosts(limit: number): Promise<StoredPost[]> {
    const rows = await this.selectPosts()
      .orderBy('post.receivedAt', 'desc')
      .orderBy('post.id', 'desc')
      .limit(Math.max(0, Math.floor(limit)))
      .execute();
    return rows.map(toStoredPost);
  }

  /** Only replies whose parent already belongs to a thread; orphans never block the batch. */
  async listUnassignedReplies(limit: number): Promise<StoredPost[]> {
    const rows = await this.selectPosts()
      .where('vision.id', 'is', null)
      .where('reply.id', 'is', null)
      .where((eb) =>
        eb.or([
          eb(
            'post.inReplyToExternalId',
            'in',
            eb.selectFrom('post as parent').innerJoin('vision as pv', 'pv.postId', 'parent.id').select('parent.externalId'),
          ),
          eb(
            'post.inReplyToExternalId',
            'in',
            eb.selectFrom('post as parent').innerJoin('reply as pr', 'pr.postId', 'parent.id').select('parent.externalId'),
          ),
        ]),
      )
      .orderBy('post.receivedAt', 'asc')
      .orderBy('post.id', 'asc')
      .limit(Math.max(0, Math.floor(limit)))
      .execute();
    return rows.map(toStoredPost);
  }

  async markAsThreadRoot(post: StoredPost): Promise<ThreadRoot> {
    return await this.db.transaction().execute(async (trx) => {
      const existing = await trx.selectFrom('vision').selectAll().where('postId', '=', post.id).executeTakeFirst();
      if (existing) return toThreadRoot(existing);

      const authorIds = await this.authorIdsFor(trx, [post]);
      const authorId = authorIds.get(post.author.externalId);
      if (!authorId) throw new Error(`Author ${post.author.externalId} missing for post ${post.id}`);

      // A reply promoted to a root stops being a reply.
      await trx.deleteFrom('reply').where('postId', '=', post.id).execute();
      await trx
        .insertInto('vision')
        .values({ id: randomUUID(), postId: post.id, authorId, text: post.text, categoryId: null, updatedAt: new Date() })
        .onConflict((oc) => oc.column('postId').doNothing())
        .execute();

      const row = await trx.selectFrom('vision').selectAll().where('postId', '=', post.id).executeTakeFirstOrThrow();
      return toThreadRoot(row);
    });
  }

  async markManyAsThreadRoots(posts: readonly StoredPost[]): Promise<number> {
    const unique = uniqueById(posts);
    if (unique.length === 0) return 0;

    return await this.db.transaction().execute(async (trx) => {
      const authorIds = await this.authorIdsFor(trx, unique);
      const now = new Date();
      const values = unique.map((p) => {
        const authorId = authorIds.get(p.author.externalId);
        if (!authorId) throw new Error(`Author ${p.author.externalId} missing for post ${p.id}`);
        return { id: randomUUID(), postId: p.id, authorId, text: p.text, categoryId: null, updatedAt: now };
      });

      const postIds = unique.map((p) => p.id);
      await trx.deleteFrom('reply').where('postId', 'in', postIds).execute();
      await trx
        .insertInto('vision')
        .values(values)
        .onConflict((oc) => oc.column('postId').doNothing())
        .execute();
      return unique.length;
    });
  }

  async markAsThreadReply(post: StoredPost, ancestor: AssignedPost): Promise<ThreadReply> {
    return await this.db.transaction().execute(async (trx) => {
      await this.assertNoRoots(trx, [post.id]);
      const row = await trx
        .insertInto('reply')
        .values({ id: randomUUID(), postId: post.id, visionId: visionIdOf(ancestor) })
        .onConflict((oc) => oc.column('postId').doUpdateSet({ visionId: visionIdOf(ancestor) }))
        .returning(['id', 'postId', 'visionId'])
        .executeTakeFirstOrThrow();
      return { id: row.id, postId: row.postId, visionId: row.visionId };
    });
  }

  async markManyAsThreadReplies(conversions: readonly ReplyConversion[]): Promise<number> {
    const byPost = new Map<string, ReplyConversion>();
    for (const c of conversions) byPost.set(c.post.id, c);
    if (byPost.size === 0) return 0;

    return await this.db.transaction().execute(async (trx) => {
      await this.assertNoRoots(trx, Array.from(byPost.keys()));
      await trx
        .insertInto('reply')
        .values(
          Array.from(byPost.values()).map((c) => ({
            id: randomUUID(),
            postId: c.post.id,
            visionId: visionIdOf(c.ancestor),
          })),
        )
        .onConflict((oc) => oc.column('postId').doUpdateSet((eb) => ({ visionId: eb.ref('excluded.visionId') })))
        .execute();
      return byPost.size;
    });
  }

  private async assertNoRoots(db: Db, postIds: readonly string[]): Promise<void> {
    const roots = await db.selectFrom('vision').select(['postId']).where('postId', 'in', postIds).execute();
    const first = roots[0];
    if (first) throw new ThreadStateConflict(first.postId, `Post ${first.postId} is already a vision`);
  }
}
