import { Injectable } from '@nestjs/common';
import type { UserRow } from '../database/database.schema';
import { DatabaseService } from '../database/database.service';
import type { RemoteProfile } from './profile-client';

export type UserListQuery = {
  q?: string | null;
  limit: number;
  cursor?: string | null;
};

@Injectable()
export class UsersRepository {
  constructor(private readonly db: DatabaseService) {}

  /** Provider ids of every stored user, oldest first (ties broken by id). */
  async listExternalIdsInStableOrder(): Promise<string[]> {
    const rows = await this.db
      .selectFrom('user')
      .select(['externalId'])
      .orderBy('createdAt', 'asc')
      .orderBy('id', 'asc')
      .execute();
    return rows.map((r) => r.externalId);
  }

  /** Returns how many stored users were updated; profiles for unknown ids are ignored. */
  async applyProfiles(profiles: readonly RemoteProfile[], refreshedAt: Date): Promise<number> {
    if (profiles.length === 0) return 0;
    return await this.db.transaction().execute(async (trx) => {
      let updated = 0;
      for (const p of profiles) {
        const res = await trx
          .updateTable('user')
          .set({
            screenName: p.screenName,
            name: p.name,
            profileImageUrl: p.profileImageUrl,
            description: p.description,
            location: p.location,
            followersCount: p.followersCount,
            profileRefreshedAt: refreshedAt,
            updatedAt: refreshedAt,
          })
          .where('externalId', '=', p.externalId)
          .executeTakeFirst();
        if (res.numUpdatedRows > 0n) updated += 1;
      }
      return updated;
    });
  }

  async list(query: UserListQuery): Promise<{ users: UserRow[]; nextCursor: string | null }> {
    const q = (query.q ?? '').trim().replace(/^@/, '');
    let builder = this.db.selectFrom('user').selectAll().orderBy('id', 'desc').limit(query.limit + 1);
    if (q) {
      const like = `%${q.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
      builder = builder.where((eb) => eb.or([eb('screenName', 'ilike', like), eb('name', 'ilike', like)]));
    }
    if (query.cursor) builder = builder.where('id', '<', query.cursor);

    const rows = await builder.execute();
    const users = rows.slice(0, query.limit);
    const nextCursor = rows.length > query.limit ? users[users.length - 1]?.id ?? null : null;
    return { users, nextCursor };
  }

  async setVisibleOnHome(id: string, visibleOnHome: boolean): Promise<UserRow | null> {
    const row = await this.db
      .updateTable('user')
      .set({ visibleOnHome, updatedAt: new Date() })
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirst();
    return row ?? null;
  }
}
