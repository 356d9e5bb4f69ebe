/** Why a post's reply target does not lead to a vision. Recoverable. */
export type ResolutionFailureReason =
  | 'no_reply_target'
  | 'target_not_found'
  | 'target_unassigned'
  | 'already_thread_root';

/** The requested transition would leave a post in two thread states at once. */
export class ThreadStateConflict extends Error {
  override readonly name = 'ThreadStateConflict';

  constructor(
    readonly postId: string,
    message: string,
  ) {
    super(message);
  }
}
