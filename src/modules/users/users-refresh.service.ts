import { Logger } from '@nestjs/common';
import { chunk } from '../../common/collections/chunk';
import { sleep as defaultSleep, type SleepFn } from '../../common/time/sleep';
import type { ProfileClient } from './profile-client';
import type { UsersRepository } from './users.repository';

export type UsersRefreshOptions = {
  chunkSize: number;
  /** Pause between two remote calls; keeps the run under the provider's rate limit. */
  delayMs: number;
  sleep?: SleepFn;
};

export type UsersRefreshResult = {
  users: number;
  chunks: number;
};

export class UsersRefreshService {
  private readonly logger = new Logger(UsersRefreshService.name);
  private readonly sleep: SleepFn;

  constructor(
    private readonly source: Pick<UsersRepository, 'listExternalIdsInStableOrder'>,
    private readonly client: ProfileClient,
    private readonly options: UsersRefreshOptions,
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** A failing chunk aborts the run; chunks already sent stay refreshed. */
  async refreshAll(): Promise<UsersRefreshResult> {
    const ids = await this.source.listExternalIdsInStableOrder();
    const groups = chunk(ids, this.options.chunkSize);
    this.logger.log(`Refreshing ${ids.length} user(s) in ${groups.length} chunk(s)`);

    for (const [i, group] of groups.entries()) {
      if (i > 0) {
        this.logger.debug(`Waiting ${this.options.delayMs}ms before chunk ${i + 1}/${groups.length}`);
        await this.sleep(this.options.delayMs);
      }
      this.logger.log(`Refreshing chunk ${i + 1}/${groups.length} (${group.length} user(s))`);
      await this.client.refreshUsers(group);
    }
    return { users: ids.length, chunks: groups.length };
  }
}
