import type {
  AssignedPost,
  PostPayload,
  ReplyConversion,
  StoredPost,
  ThreadReply,
  ThreadRoot,
} from './conversation.types';

export const CONVERSATION_STORE = Symbol('CONVERSATION_STORE');

export type UpsertPostResult = {
  post: StoredPost;
  created: boolean;
};

/**
 * Storage for ingested posts and their thread state.
 *
 * `upsertPost` is idempotent by external id: a second call with a newer payload
 * replaces the stored fields and keeps the existing assignment. Only the mark*
 * operations change assignment, and they keep every post in exactly one state.
 */
export interface ConversationStore {
  upsertPost(externalId: string, payload: PostPayload): Promise<UpsertPostResult>;
  getPostByExternalId(externalId: string): Promise<StoredPost | null>;
  getPostsByExternalIds(externalIds: readonly string[]): Promise<StoredPost[]>;
  getPostsByIds(ids: readonly string[]): Promise<StoredPost[]>;
  deletePostByExternalId(externalId: string): Promise<boolean>;
  /** Newest first by arrival time. */
  recentPosts(limit: number): Promise<StoredPost[]>;
  /** Unassigned posts whose reply target is already a vision or a reply, oldest first. */
  listUnassignedReplies(limit: number): Promise<StoredPost[]>;

  markAsThreadRoot(post: StoredPost): Promise<ThreadRoot>;
  markAsThreadReply(post: StoredPost, ancestor: AssignedPost): Promise<ThreadReply>;
  markManyAsThreadRoots(posts: readonly StoredPost[]): Promise<number>;
  markManyAsThreadReplies(conversions: readonly ReplyConversion[]): Promise<number>;
}
