import type { DecodedPost } from '../conversations/conversation.types';

export type StreamEvent =
  | { kind: 'post'; post: DecodedPost; reshare: boolean }
  | { kind: 'delete'; externalId: string }
  | { kind: 'disconnect'; reason: string; code: number | null };

export type StreamConnectParams = {
  keywords: readonly string[];
  followIds: readonly string[];
  /** Aborting it closes the connection and ends the iteration without an error. */
  signal?: AbortSignal;
};

export const STREAM_CLIENT = Symbol('STREAM_CLIENT');

/** Opens the filtered stream and yields decoded records until the connection closes. */
export interface StreamClient {
  connect(params: StreamConnectParams): AsyncIterable<StreamEvent>;
}

export type StreamRunStats = {
  seen: number;
  kept: number;
  attached: number;
  discarded: number;
  reshares: number;
  deleted: number;
};

export type StreamRunOutcome = { stats: StreamRunStats } & (
  | { kind: 'disconnected'; reason: string; code: number | null }
  | { kind: 'restart_requested'; authorExternalId: string; authorScreenName: string }
  | { kind: 'stream_ended' }
  | { kind: 'stopped' }
);
