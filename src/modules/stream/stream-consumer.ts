import { Logger } from '@nestjs/common';
import { ThreadStateConflict } from '../../common/errors/thread-errors';
import type { ConversationClassifier } from '../conversations/conversation-classifier';
import type { ConversationStore } from '../conversations/conversation-store';
import type { DecodedPost, PostPayload } from '../conversations/conversation.types';
import type { StreamEvent, StreamRunOutcome, StreamRunStats } from './stream.types';

export function emptyStreamStats(): StreamRunStats {
  return { seen: 0, kept: 0, attached: 0, discarded: 0, reshares: 0, deleted: 0 };
}

function payloadOf(post: DecodedPost): PostPayload {
  const { externalId: _externalId, ...payload } = post;
  return payload;
}

type PostDecision = { restartFor: DecodedPost['author'] } | null;

/**
 * Consumes one connection's worth of records.
 *
 * Ends on a disconnect notice, when the connection closes, when `shouldStop`
 * turns true between records, or as soon as a kept post comes from an author
 * outside `followedIds` (the caller reconnects with a recomputed follow list).
 */
export class StreamConsumer {
  private readonly logger = new Logger(StreamConsumer.name);

  constructor(
    private readonly store: ConversationStore,
    private readonly classifier: ConversationClassifier,
  ) {}

  async consume(
    events: AsyncIterable<StreamEvent>,
    followedIds: ReadonlySet<string>,
    shouldStop: () => boolean = () => false,
  ): Promise<StreamRunOutcome> {
    const stats = emptyStreamStats();

    for await (const event of events) {
      if (shouldStop()) return { kind: 'stopped', stats };
      stats.seen++;

      if (event.kind === 'disconnect') {
        this.logger.log(`Stream disconnected by provider. Reason: ${event.reason} (${event.code ?? 'no code'})`);
        return { kind: 'disconnected', reason: event.reason, code: event.code, stats };
      }

      if (event.kind === 'delete') {
        if (await this.store.deletePostByExternalId(event.externalId)) {
          stats.deleted++;
          this.logger.log(`Deleted post ${event.externalId} on provider request`);
        }
        continue;
      }

      const decision = await this.handlePost(event.post, event.reshare, followedIds, stats);
      if (decision) {
        this.logger.log(`New author @${decision.restartFor.screenName}; restarting stream`);
        return {
          kind: 'restart_requested',
          authorExternalId: decision.restartFor.externalId,
          authorScreenName: decision.restartFor.screenName,
          stats,
        };
      }
    }

    return { kind: 'stream_ended', stats };
  }

  private async handlePost(
    post: DecodedPost,
    reshare: boolean,
    followedIds: ReadonlySet<string>,
    stats: StreamRunStats,
  ): Promise<PostDecision> {
    if (reshare) {
      stats.reshares++;
      this.logger.debug(`Post ${post.externalId} is a reshare; skipping`);
      return null;
    }

    const classification = await this.classifier.classify(post);
    if (classification.action === 'discard') {
      stats.discarded++;
      this.logger.debug(`Post ${post.externalId} matched no thread or keyword; discarding`);
      return null;
    }

    const { post: stored } = await this.store.upsertPost(post.externalId, payloadOf(post));

    if (classification.action === 'attach_as_reply') {
      try {
        await this.store.markAsThreadReply(stored, classification.ancestor);
        stats.attached++;
        this.logger.debug(`Post ${post.externalId} attached to vision ${classification.ancestor.assignment.visionId}`);
      } catch (err) {
        if (!(err instanceof ThreadStateConflict)) throw err;
        stats.kept++;
        this.logger.debug(`Post ${post.externalId} is already a vision; kept as is`);
      }
    } else {
      stats.kept++;
      this.logger.debug(`Post ${post.externalId} matched tracked keywords; kept as candidate`);
    }

    if (!followedIds.has(post.author.externalId)) return { restartFor: post.author };
    return null;
  }
}
