import { Kysely, Migration, MigrationProvider, sql } from 'kysely';

const migrations: Record<string, Migration> = {};

export const migrationProvider: MigrationProvider = {
  async getMigrations() {
    return migrations;
  },
};

migrations['001'] = {
  async up(db: Kysely<unknown>) {
    await db.schema
      .createTable('user')
      .addColumn('id', 'varchar', (col) => col.primaryKey())
      .addColumn('externalId', 'varchar', (col) => col.notNull().unique())
      .addColumn('screenName', 'varchar', (col) => col.notNull())
      .addColumn('name', 'varchar', (col) => col.notNull())
      .addColumn('profileImageUrl', 'varchar')
      .addColumn('description', 'text')
      .addColumn('location', 'varchar')
      .addColumn('followersCount', 'integer')
      .addColumn('visibleOnHome', 'boolean', (col) => col.notNull().defaultTo(false))
      .addColumn('profileRefreshedAt', 'timestamptz')
      .addColumn('createdAt', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .addColumn('updatedAt', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .execute();

    await db.schema
      .createTable('post')
      .addColumn('id', 'varchar', (col) => col.primaryKey())
      .addColumn('externalId', 'varchar', (col) => col.notNull().unique())
      .addColumn('authorExternalId', 'varchar', (col) => col.notNull())
      .addColumn('authorScreenName', 'varchar', (col) => col.notNull())
      .addColumn('authorName', 'varchar', (col) => col.notNull())
      .addColumn('text', 'text', (col) => col.notNull())
      .addColumn('inReplyToExternalId', 'varchar')
      .addColumn('raw', 'jsonb', (col) => col.notNull())
      .addColumn('receivedAt', 'timestamptz', (col) => col.notNull())
      .addColumn('updatedAt', 'timestamptz', (col) => col.notNull())
      .execute();
    await db.schema.createIndex('post_received_at_idx').on('post').columns(['receivedAt', 'id']).execute();
    await db.schema.createIndex('post_in_reply_to_idx').on('post').column('inReplyToExternalId').execute();

    await db.schema
      .createTable('category')
      .addColumn('id', 'varchar', (col) => col.primaryKey())
      .addColumn('name', 'varchar', (col) => col.notNull().unique())
      .execute();

    await db.schema
      .createTable('vision')
      .addColumn('id', 'varchar', (col) => col.primaryKey())
      .addColumn('postId', 'varchar', (col) => col.notNull().unique().references('post.id').onDelete('cascade'))
      .addColumn('authorId', 'varchar', (col) => col.notNull().references('user.id').onDelete('cascade'))
      .addColumn('text', 'text', (col) => col.notNull())
      .addColumn('categoryId', 'varchar', (col) => col.references('category.id').onDelete('set null'))
      .addColumn('featured', 'boolean', (col) => col.notNull().defaultTo(false))
      .addColumn('createdAt', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .addColumn('updatedAt', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .execute();

    await db.schema
      .createTable('vision_supporter')
      .addColumn('visionId', 'varchar', (col) => col.notNull().references('vision.id').onDelete('cascade'))
      .addColumn('userId', 'varchar', (col) => col.notNull().references('user.id').onDelete('cascade'))
      .addPrimaryKeyConstraint('vision_supporter_pk', ['visionId', 'userId'])
      .execute();

    await db.schema
      .createTable('reply')
      .addColumn('id', 'varchar', (col) => col.primaryKey())
      .addColumn('postId', 'varchar', (col) => col.notNull().unique().references('post.id').onDelete('cascade'))
      .addColumn('visionId', 'varchar', (col) => col.notNull().references('vision.id').onDelete('cascade'))
      .addColumn('createdAt', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .execute();

    await db.schema
      .createTable('share')
      .addColumn('id', 'varchar', (col) => col.primaryKey())
      .addColumn('visionId', 'varchar', (col) => col.notNull().references('vision.id').onDelete('cascade'))
      .addColumn('userId', 'varchar', (col) => col.references('user.id').onDelete('set null'))
      .addColumn('externalId', 'varchar')
      .addColumn('createdAt', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .execute();
  },
  async down(db: Kysely<unknown>) {
    await db.schema.dropTable('share').execute();
    await db.schema.dropTable('reply').execute();
    await db.schema.dropTable('vision_supporter').execute();
    await db.schema.dropTable('vision').execute();
    await db.schema.dropTable('category').execute();
    await db.schema.dropTable('post').execute();
    await db.schema.dropTable('user').execute();
  },
};
