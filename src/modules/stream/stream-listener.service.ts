import { Logger } from '@nestjs/common';
import { sleep as defaultSleep, type SleepFn } from '../../common/time/sleep';
import { ConversationClassifier } from '../conversations/conversation-classifier';
import type { ConversationStore } from '../conversations/conversation-store';
import { emptyStreamStats, StreamConsumer } from './stream-consumer';
import type { StreamClient, StreamRunOutcome } from './stream.types';

export type StreamListenerOptions = {
  keywords: readonly string[];
  /** Authors of this many most recent posts are followed. */
  recentWindow: number;
  /** Minimum time between two connects caused by restart requests. 0 disables. */
  restartMinIntervalMs: number;
  sleep?: SleepFn;
  now?: () => number;
};

export type StreamListenResult = {
  outcome: StreamRunOutcome;
  connections: number;
};

export type FollowList = {
  ids: string[];
  screenNames: string[];
};

/**
 * Owns the connection parameters: reconnects with a recomputed follow list each
 * time the consumer asks for a restart, and returns on any other outcome.
 */
export class StreamListenerService {
  private readonly logger = new Logger(StreamListenerService.name);
  private readonly consumer: StreamConsumer;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private stopRequested = false;
  private connection: AbortController | null = null;

  constructor(
    private readonly store: ConversationStore,
    private readonly client: StreamClient,
    private readonly options: StreamListenerOptions,
  ) {
    this.consumer = new StreamConsumer(store, new ConversationClassifier(store, options.keywords));
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async followList(): Promise<FollowList> {
    const recent = await this.store.recentPosts(this.options.recentWindow);
    const ids: string[] = [];
    const screenNames: string[] = [];
    const seen = new Set<string>();
    for (const post of recent) {
      if (seen.has(post.author.externalId)) continue;
      seen.add(post.author.externalId);
      ids.push(post.author.externalId);
      screenNames.push(post.author.screenName);
    }
    return { ids, screenNames };
  }

  async listen(): Promise<StreamListenResult> {
    this.stopRequested = false;
    let connections = 0;
    let lastConnectAt: number | null = null;

    while (true) {
      const follow = await this.followList();

      if (lastConnectAt !== null && this.options.restartMinIntervalMs > 0) {
        const waitMs = lastConnectAt + this.options.restartMinIntervalMs - this.now();
        if (waitMs > 0) {
          this.logger.log(`Waiting ${waitMs}ms before reconnecting`);
          await this.sleep(waitMs);
        }
      }
      if (this.stopRequested) return { outcome: { kind: 'stopped', stats: emptyStreamStats() }, connections };

      this.logger.log(
        `Tracking "${this.options.keywords.join(',')}" and following ${follow.ids.length} author(s)` +
          (follow.screenNames.length ? `: ${follow.screenNames.slice(0, 20).join(',')}` : ''),
      );
      lastConnectAt = this.now();
      connections++;

      const connection = new AbortController();
      this.connection = connection;
      let outcome: StreamRunOutcome;
      try {
        outcome = await this.consumer.consume(
          this.client.connect({ keywords: this.options.keywords, followIds: follow.ids, signal: connection.signal }),
          new Set(follow.ids),
          () => this.stopRequested,
        );
      } finally {
        this.connection = null;
      }
      // An aborted connection ends like a closed one.
      if (this.stopRequested && outcome.kind === 'stream_ended') outcome = { kind: 'stopped', stats: outcome.stats };

      const { seen, kept, attached, discarded } = outcome.stats;
      this.logger.log(`Connection ${connections} ended (${outcome.kind}): seen=${seen} kept=${kept} attached=${attached} discarded=${discarded}`);
      if (outcome.kind !== 'restart_requested') return { outcome, connections };
    }
  }

  /**
   * Takes effect before the next record or connect; never interrupts a record.
   * A connection waiting on a quiet stream is closed right away.
   */
  stop() {
    this.stopRequested = true;
    this.connection?.abort();
  }
}
