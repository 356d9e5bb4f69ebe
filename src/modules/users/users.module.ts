import { Module } from '@nestjs/common';
import { RemoteError } from '../../common/errors/remote-error';
import { AppConfigService } from '../app/app-config.service';
import { HttpProfileClient } from './http-profile.client';
import { PROFILE_CLIENT, type ProfileClient } from './profile-client';
import { UsersRefreshCron } from './users-refresh.cron';
import { UsersRefreshService } from './users-refresh.service';
import { UsersRepository } from './users.repository';

const unconfiguredProfileClient: ProfileClient = {
  async refreshUsers() {
    throw new RemoteError('profiles', 'Profile API credentials are not configured');
  },
};

@Module({
  providers: [
    UsersRepository,
    {
      provide: PROFILE_CLIENT,
      inject: [AppConfigService, UsersRepository],
      useFactory: (cfg: AppConfigService, users: UsersRepository): ProfileClient => {
        const creds = cfg.profileApi();
        return creds ? new HttpProfileClient(creds, users) : unconfiguredProfileClient;
      },
    },
    {
      provide: UsersRefreshService,
      inject: [UsersRepository, PROFILE_CLIENT, AppConfigService],
      useFactory: (users: UsersRepository, client: ProfileClient, cfg: AppConfigService) =>
        new UsersRefreshService(users, client, {
          chunkSize: cfg.usersRefreshChunkSize(),
          delayMs: cfg.usersRefreshDelayMs(),
        }),
    },
    UsersRefreshCron,
  ],
  exports: [UsersRepository, UsersRefreshService, UsersRefreshCron],
})
export class UsersModule {}
