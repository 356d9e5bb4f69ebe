import type { ConversationStore } from '../../src/modules/conversations/conversation-store';
import {
  isAssigned,
  type AssignedPost,
  type DecodedPost,
  type PostAuthor,
  type PostPayload,
} from '../../src/modules/conversations/conversation.types';
import type { StreamClient, StreamConnectParams, StreamEvent } from '../../src/modules/stream/stream.types';

export const T0 = new Date('2026-03-01T12:00:00.000Z');

export function at(minutes: number): Date {
  return new Date(T0.getTime() + minutes * 60_000);
}

export function author(externalId: string, screenName = `user${externalId}`): PostAuthor {
  return { externalId, screenName, name: screenName.toUpperCase() };
}

type PostOverrides = Partial<Omit<DecodedPost, 'externalId'>>;

export function decodedPost(externalId: string, overrides: PostOverrides = {}): DecodedPost {
  return {
    externalId,
    author: author('u1', 'alice'),
    text: '',
    inReplyToExternalId: null,
    raw: { id_str: externalId },
    receivedAt: T0,
    ...overrides,
  };
}

export function payload(overrides: PostOverrides = {}): PostPayload {
  const { externalId: _externalId, ...rest } = decodedPost('unused', overrides);
  return rest;
}

export function postEvent(post: DecodedPost, reshare = false): StreamEvent {
  return { kind: 'post', post, reshare };
}

export async function* eventsOf(events: readonly StreamEvent[]): AsyncGenerator<StreamEvent> {
  for (const event of events) yield event;
}

/** Serves one scripted record list per connect and remembers the parameters of each. */
export class ScriptedStreamClient implements StreamClient {
  readonly connects: StreamConnectParams[] = [];

  constructor(private readonly scripts: ReadonlyArray<readonly StreamEvent[] | (() => AsyncIterable<StreamEvent>)>) {}

  connect(params: StreamConnectParams): AsyncIterable<StreamEvent> {
    this.connects.push({ keywords: [...params.keywords], followIds: [...params.followIds] });
    const script = this.scripts[this.connects.length - 1] ?? [];
    return typeof script === 'function' ? script() : eventsOf(script);
  }
}

async function reload(store: ConversationStore, externalId: string): Promise<AssignedPost> {
  const post = await store.getPostByExternalId(externalId);
  if (!post || !isAssigned(post)) throw new Error(`post ${externalId} is not part of a thread`);
  return post;
}

/** Stores a post and promotes it to a vision. */
export async function seedRoot(store: ConversationStore, externalId: string, overrides: PostOverrides = {}) {
  const { post } = await store.upsertPost(externalId, payload(overrides));
  await store.markAsThreadRoot(post);
  return await reload(store, externalId);
}

/** Stores a post replying to `parentExternalId` and attaches it to the parent's thread. */
export async function seedReply(
  store: ConversationStore,
  externalId: string,
  parentExternalId: string,
  overrides: PostOverrides = {},
) {
  const parent = await reload(store, parentExternalId);
  const { post } = await store.upsertPost(externalId, payload({ ...overrides, inReplyToExternalId: parentExternalId }));
  await store.markAsThreadReply(post, parent);
  return await reload(store, externalId);
}
