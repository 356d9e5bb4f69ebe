import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import type { PostAuthor } from '../conversations/conversation.types';

export type AssignmentFilter = 'visions' | 'replies' | 'unassigned';

export type AdminPostListQuery = {
  assignment: AssignmentFilter | null;
  q: string | null;
  limit: number;
  cursor: string | null;
};

export type AdminPostAssignment =
  | { kind: 'vision'; visionId: string }
  | { kind: 'reply'; replyId: string; visionId: string }
  | { kind: 'unassigned' };

export type AdminPostItem = {
  id: string;
  externalId: string;
  tweeter: string;
  text: string;
  receivedAt: string;
  assignment: AdminPostAssignment;
  isReply: boolean;
};

export function formatTweeter(author: Pick<PostAuthor, 'screenName' | 'name'>): string {
  return `${author.screenName} (${author.name})`;
}

export function visionsMessage(converted: number): string {
  return `Converted ${converted} post(s) to visions.`;
}

export function repliesMessage(succeeded: number, failed: number): string {
  if (failed === 0) return `Converted ${succeeded} post(s) to replies.`;
  return (
    `Converted ${succeeded} post(s) to replies. ${failed} post(s) are not yet replies to visions. ` +
    'Assign them to be replies before retrying.'
  );
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

@Injectable()
export class AdminPostsService {
  constructor(private readonly db: DatabaseService) {}

  async list(query: AdminPostListQuery): Promise<{ items: AdminPostItem[]; nextCursor: string | null }> {
    let builder = this.db
      .selectFrom('post')
      .leftJoin('vision', 'vision.postId', 'post.id')
      .leftJoin('reply', 'reply.postId', 'post.id')
      .select([
        'post.id as id',
        'post.externalId as externalId',
        'post.authorScreenName as screenName',
        'post.authorName as name',
        'post.text as text',
        'post.inReplyToExternalId as inReplyToExternalId',
        'post.receivedAt as receivedAt',
        'vision.id as visionId',
        'reply.id as replyId',
        'reply.visionId as replyVisionId',
      ])
      .orderBy('post.receivedAt', 'desc')
      .orderBy('post.id', 'desc')
      .limit(query.limit + 1);

    if (query.assignment === 'visions') builder = builder.where('vision.id', 'is not', null);
    if (query.assignment === 'replies') builder = builder.where('reply.id', 'is not', null);
    if (query.assignment === 'unassigned') {
      builder = builder.where('vision.id', 'is', null).where('reply.id', 'is', null);
    }

    const q = (query.q ?? '').trim();
    if (q) {
      const like = `%${escapeLike(q)}%`;
      builder = builder.where((eb) =>
        eb.or([eb('post.text', 'ilike', like), eb('post.authorScreenName', 'ilike', like), eb('post.authorName', 'ilike', like)]),
      );
    }

    if (query.cursor) {
      const cursor = await this.db
        .selectFrom('post')
        .select(['id', 'receivedAt'])
        .where('id', '=', query.cursor)
        .executeTakeFirst();
      if (cursor) {
        builder = builder.where((eb) =>
          eb.or([
            eb('post.receivedAt', '<', cursor.receivedAt),
            eb.and([eb('post.receivedAt', '=', cursor.receivedAt), eb('post.id', '<', cursor.id)]),
          ]),
        );
      }
    }

    const rows = await builder.execute();
    const slice = rows.slice(0, query.limit);
    const items = slice.map((r): AdminPostItem => {
      const assignment: AdminPostAssignment = r.visionId
        ? { kind: 'vision', visionId: r.visionId }
        : r.replyId && r.replyVisionId
          ? { kind: 'reply', replyId: r.replyId, visionId: r.replyVisionId }
          : { kind: 'unassigned' };
      return {
        id: r.id,
        externalId: r.externalId,
        tweeter: formatTweeter({ screenName: r.screenName, name: r.name }),
        text: r.text,
        receivedAt: new Date(r.receivedAt).toISOString(),
        assignment,
        isReply: r.inReplyToExternalId !== null,
      };
    });
    const nextCursor = rows.length > query.limit ? slice[slice.length - 1]?.id ?? null : null;
    return { items, nextCursor };
  }
}
