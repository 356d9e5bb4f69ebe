import { Module } from '@nestjs/common';
import { RemoteError } from '../../common/errors/remote-error';
import { AppConfigService } from '../app/app-config.service';
import { ConversationsModule } from '../conversations/conversations.module';
import { CONVERSATION_STORE, type ConversationStore } from '../conversations/conversation-store';
import { HttpStreamClient } from './http-stream.client';
import { StreamListenerCron } from './stream-listener.cron';
import { StreamListenerService } from './stream-listener.service';
import { STREAM_CLIENT, type StreamClient } from './stream.types';

const unconfiguredStreamClient: StreamClient = {
  connect() {
    throw new RemoteError('stream', 'Stream credentials are not configured');
  },
};

@Module({
  imports: [ConversationsModule],
  providers: [
    {
      provide: STREAM_CLIENT,
      inject: [AppConfigService],
      useFactory: (cfg: AppConfigService): StreamClient => {
        const creds = cfg.stream();
        return creds ? new HttpStreamClient(creds) : unconfiguredStreamClient;
      },
    },
    {
      provide: StreamListenerService,
      inject: [CONVERSATION_STORE, STREAM_CLIENT, AppConfigService],
      useFactory: (store: ConversationStore, client: StreamClient, cfg: AppConfigService) =>
        new StreamListenerService(store, client, {
          keywords: cfg.streamKeywords(),
          recentWindow: cfg.streamRecentWindow(),
          restartMinIntervalMs: cfg.streamRestartMinIntervalMs(),
        }),
    },
    StreamListenerCron,
  ],
  exports: [StreamListenerService, StreamListenerCron],
})
export class StreamModule {}
