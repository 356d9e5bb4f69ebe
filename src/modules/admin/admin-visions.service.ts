import { ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import type { CategoryRow } from '../database/database.schema';
import { DatabaseService } from '../database/database.service';

export type VisionListQuery = {
  categoryId: string | null;
  featured: boolean | null;
  q: string | null;
  limit: number;
};

export type VisionPatch = {
  text?: string;
  categoryId?: string | null;
  featured?: boolean;
};

export type AdminVisionItem = {
  id: string;
  postId: string;
  author: { id: string; screenName: string; name: string };
  text: string;
  categoryId: string | null;
  featured: boolean;
  supporters: number;
  replies: number;
  shares: number;
  createdAt: string;
  updatedAt: string;
};

/** Unique-violation code reported by Postgres. */
const PG_UNIQUE_VIOLATION = '23505';

function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === PG_UNIQUE_VIOLATION;
}

@Injectable()
export class AdminVisionsService {
  constructor(private readonly db: DatabaseService) {}

  async listCategories(): Promise<CategoryRow[]> {
    return await this.db.selectFrom('category').selectAll().orderBy('name', 'asc').execute();
  }

  async createCategory(name: string): Promise<CategoryRow> {
    try {
      return await this.db
        .insertInto('category')
        .values({ id: randomUUID(), name })
        .returningAll()
        .executeTakeFirstOrThrow();
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictException('Category already exists.');
      throw err;
    }
  }

  async list(query: VisionListQuery): Promise<AdminVisionItem[]> {
    let builder = this.db
      .selectFrom('vision')
      .innerJoin('user', 'user.id', 'vision.authorId')
      .select((eb) => [
        'vision.id as id',
        'vision.postId as postId',
        'vision.text as text',
        'vision.categoryId as categoryId',
        'vision.featured as featured',
        'vision.createdAt as createdAt',
        'vision.updatedAt as updatedAt',
        'user.id as authorId',
        'user.screenName as authorScreenName',
        'user.name as authorName',
        eb
          .selectFrom('vision_supporter')
          .select((s) => s.fn.countAll<string>().as('n'))
          .whereRef('vision_supporter.visionId', '=', 'vision.id')
          .as('supporters'),
        eb
          .selectFrom('reply')
          .select((s) => s.fn.countAll<string>().as('n'))
          .whereRef('reply.visionId', '=', 'vision.id')
          .as('replies'),
        eb
          .selectFrom('share')
          .select((s) => s.fn.countAll<string>().as('n'))
          .whereRef('share.visionId', '=', 'vision.id')
          .as('shares'),
      ])
      .orderBy('vision.createdAt', 'desc')
      .orderBy('vision.id', 'desc')
      .limit(query.limit);

    if (query.categoryId) builder = builder.where('vision.categoryId', '=', query.categoryId);
    if (query.featured !== null) builder = builder.where('vision.featured', '=', query.featured);
    const q = (query.q ?? '').trim();
    if (q) builder = builder.where('vision.text', 'ilike', `%${q.replace(/[\\%_]/g, (c) => `\\${c}`)}%`);

    const rows = await builder.execute();
    return rows.map((r) => ({
      id: r.id,
      postId: r.postId,
      author: { id: r.authorId, screenName: r.authorScreenName, name: r.authorName },
      text: r.text,
      categoryId: r.categoryId,
      featured: r.featured,
      supporters: Number(r.supporters ?? 0),
      replies: Number(r.replies ?? 0),
      shares: Number(r.shares ?? 0),
      createdAt: new Date(r.createdAt).toISOString(),
      updatedAt: new Date(r.updatedAt).toISOString(),
    }));
  }

  async update(id: string, patch: VisionPatch) {
    if (patch.categoryId) await this.requireCategory(patch.categoryId);
    const row = await this.db
      .updateTable('vision')
      .set({
        ...(patch.text !== undefined ? { text: patch.text } : {}),
        ...(patch.categoryId !== undefined ? { categoryId: patch.categoryId } : {}),
        ...(patch.featured !== undefined ? { featured: patch.featured } : {}),
        updatedAt: new Date(),
      })
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirst();
    if (!row) throw new NotFoundException('Vision not found.');
    return row;
  }

  async addSupporter(visionId: string, userId: string): Promise<{ supporters: number }> {
    await this.requireVision(visionId);
    await this.requireUser(userId);
    await this.db
      .insertInto('vision_supporter')
      .values({ visionId, userId })
      .onConflict((oc) => oc.columns(['visionId', 'userId']).doNothing())
      .execute();
    return { supporters: await this.countSupporters(visionId) };
  }

  async removeSupporter(visionId: string, userId: string): Promise<{ supporters: number }> {
    await this.requireVision(visionId);
    await this.db
      .deleteFrom('vision_supporter')
      .where('visionId', '=', visionId)
      .where('userId', '=', userId)
      .execute();
    return { supporters: await this.countSupporters(visionId) };
  }

  async addShare(visionId: string, input: { userId: string | null; externalId: string | null }) {
    await this.requireVision(visionId);
    if (input.userId) await this.requireUser(input.userId);
    return await this.db
      .insertInto('share')
      .values({ id: randomUUID(), visionId, userId: input.userId, externalId: input.externalId })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  private async countSupporters(visionId: string): Promise<number> {
    const row = await this.db
      .selectFrom('vision_supporter')
      .select((eb) => eb.fn.countAll<string>().as('n'))
      .where('visionId', '=', visionId)
      .executeTakeFirstOrThrow();
    return Number(row.n);
  }

  private async requireVision(id: string): Promise<void> {
    const row = await this.db.selectFrom('vision').select(['id']).where('id', '=', id).executeTakeFirst();
    if (!row) throw new NotFoundException('Vision not found.');
  }

  private async requireUser(id: string): Promise<void> {
    const row = await this.db.selectFrom('user').select(['id']).where('id', '=', id).executeTakeFirst();
    if (!row) throw new NotFoundException('User not found.');
  }

  private async requireCategory(id: string): Promise<void> {
    const row = await this.db.selectFrom('category').select(['id']).where('id', '=', id).executeTakeFirst();
    if (!row) throw new NotFoundException('Category not found.');
  }
}
