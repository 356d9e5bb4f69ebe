export type PostAuthor = {
  externalId: string;
  screenName: string;
  name: string;
};

/** What the stream (or an admin backfill) knows about a post. */
export type PostPayload = {
  author: PostAuthor;
  text: string;
  /** External id of the post this one replies to. May point outside the store. */
  inReplyToExternalId: string | null;
  raw: Record<string, unknown>;
  receivedAt: Date;
};

export type DecodedPost = PostPayload & { externalId: string };

export type PostAssignment =
  | { kind: 'unassigned' }
  | { kind: 'thread_root'; visionId: string }
  | { kind: 'thread_reply'; replyId: string; visionId: string };

export type StoredPost = {
  id: string;
  externalId: string;
  author: PostAuthor;
  text: string;
  inReplyToExternalId: string | null;
  receivedAt: Date;
  assignment: PostAssignment;
};

export type AssignedPost = StoredPost & {
  assignment: Exclude<PostAssignment, { kind: 'unassigned' }>;
};

export type ThreadRoot = {
  id: string;
  postId: string;
  authorId: string;
  text: string;
  categoryId: string | null;
  featured: boolean;
};

export type ThreadReply = {
  id: string;
  postId: string;
  visionId: string;
};

export type ReplyConversion = {
  post: StoredPost;
  ancestor: AssignedPost;
};

export function isAssigned(post: StoredPost): post is AssignedPost {
  return post.assignment.kind !== 'unassigned';
}

/** The vision a reply to `ancestor` belongs to. */
export function visionIdOf(ancestor: AssignedPost): string {
  return ancestor.assignment.visionId;
}
