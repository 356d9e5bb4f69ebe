export const CIVIC_BACKGROUND_QUEUE = 'civic_background';

export const JOBS = {
  // Stream ingestion (long-running; one at a time via a stable job id)
  streamListen: 'stream.listen',

  // Profile cache
  usersRefresh: 'users.refresh',

  // Thread maintenance
  postsRepliesSweep: 'posts.repliesSweep',
} as const;

export type JobName = (typeof JOBS)[keyof typeof JOBS];
