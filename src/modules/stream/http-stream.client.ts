import { Logger } from '@nestjs/common';
import { RemoteError } from '../../common/errors/remote-error';
import { parseStreamEvent } from './stream-event.parser';
import type { StreamClient, StreamConnectParams, StreamEvent } from './stream.types';

export type HttpStreamClientOptions = {
  url: string;
  bearerToken: string;
  fetchImpl?: typeof fetch;
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Filter-stream transport: one long-lived POST whose body is newline-delimited JSON.
 * Blank keep-alive lines and undecodable lines are skipped.
 */
export class HttpStreamClient implements StreamClient {
  private readonly logger = new Logger(HttpStreamClient.name);
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpStreamClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async *connect(params: StreamConnectParams): AsyncGenerator<StreamEvent> {
    const form = new URLSearchParams();
    if (params.keywords.length > 0) form.set('track', params.keywords.join(','));
    if (params.followIds.length > 0) form.set('follow', params.followIds.join(','));

    const res = await this.fetchImpl(this.options.url, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.options.bearerToken}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: form.toString(),
      signal: params.signal,
    }).catch((err: unknown) => {
      if (params.signal?.aborted) return null;
      throw new RemoteError('stream', `Stream connect failed: ${errorMessage(err)}`, null, { cause: err });
    });
    if (!res) return;
    if (!res.ok || !res.body) {
      throw new RemoteError('stream', `Stream connect failed: HTTP ${res.status}`, res.status);
    }

    const reader = res.body.getReader();
    const decoder = new TextDecoder();
    let buffered = '';
    try {
      while (true) {
        const chunk = await reader.read().catch((err: unknown) => {
          if (params.signal?.aborted) return null;
          throw new RemoteError('stream', `Stream read failed: ${errorMessage(err)}`, null, { cause: err });
        });
        if (!chunk) return;
        if (chunk.done) break;

        buffered += decoder.decode(chunk.value, { stream: true });
        let newline = buffered.indexOf('\n');
        while (newline >= 0) {
          const event = this.decodeLine(buffered.slice(0, newline));
          buffered = buffered.slice(newline + 1);
          if (event) yield event;
          newline = buffered.indexOf('\n');
        }
      }
      const tail = this.decodeLine(buffered + decoder.decode());
      if (tail) yield tail;
    } finally {
      // Runs when the consumer stops iterating early, too: close the connection.
      await reader.cancel().catch((err: unknown) => this.logger.debug(`Stream cancel failed: ${errorMessage(err)}`));
    }
  }

  decodeLine(line: string): StreamEvent | null {
    const trimmed = line.trim();
    if (!trimmed) return null;
    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch {
      this.logger.warn(`Skipping malformed stream line (${trimmed.length} chars)`);
      return null;
    }
    return parseStreamEvent(raw);
  }
}
