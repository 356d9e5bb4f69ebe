import type { ColumnType, Insertable, Selectable, Updateable } from 'kysely';

type Timestamp = ColumnType<Date, Date | string, Date | string>;
type CreatedAt = ColumnType<Date, Date | string | undefined, never>;
type Json = ColumnType<unknown, string, string>;
type Defaulted<T> = ColumnType<T, T | undefined, T>;

export type DatabaseSchema = {
  user: UserTable;
  post: PostTable;
  category: CategoryTable;
  vision: VisionTable;
  vision_supporter: VisionSupporterTable;
  reply: ReplyTable;
  share: ShareTable;
};

export type UserTable = {
  id: string;
  externalId: string;
  screenName: string;
  name: string;
  profileImageUrl: string | null;
  description: string | null;
  location: string | null;
  followersCount: number | null;
  visibleOnHome: Defaulted<boolean>;
  profileRefreshedAt: Timestamp | null;
  createdAt: CreatedAt;
  updatedAt: Timestamp;
};

export type PostTable = {
  id: string;
  externalId: string;
  authorExternalId: string;
  authorScreenName: string;
  authorName: string;
  text: string;
  inReplyToExternalId: string | null;
  raw: Json; // latest decoded payload, as received
  receivedAt: Timestamp;
  updatedAt: Timestamp;
};

export type CategoryTable = {
  id: string;
  name: string;
};

export type VisionTable = {
  id: string;
  postId: string;
  authorId: string;
  text: string;
  categoryId: string | null;
  featured: Defaulted<boolean>;
  createdAt: CreatedAt;
  updatedAt: Timestamp;
};

export type VisionSupporterTable = {
  visionId: string;
  userId: string;
};

export type ReplyTable = {
  id: string;
  postId: string;
  visionId: string;
  createdAt: CreatedAt;
};

export type ShareTable = {
  id: string;
  visionId: string;
  userId: string | null;
  externalId: string | null;
  createdAt: CreatedAt;
};

export type UserRow = Selectable<UserTable>;
export type NewUserRow = Insertable<UserTable>;
export type UserRowUpdate = Updateable<UserTable>;
export type PostRow = Selectable<PostTable>;
export type VisionRow = Selectable<VisionTable>;
export type CategoryRow = Selectable<CategoryTable>;
