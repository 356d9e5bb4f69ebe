export type RemoteService = 'stream' | 'profiles';

/**
 * A failure talking to the post provider. Never retried locally: the job that
 * triggered the call fails and the scheduler decides what happens next.
 */
export class RemoteError extends Error {
  override readonly name = 'RemoteError';

  constructor(
    readonly service: RemoteService,
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}
