import { Module } from '@nestjs/common';
import { ConversationsModule } from '../conversations/conversations.module';
import { UsersModule } from '../users/users.module';
import { AdminGuard } from './admin.guard';
import { AdminCategoriesController } from './admin-categories.controller';
import { AdminJobsController } from './admin-jobs.controller';
import { AdminPostsController } from './admin-posts.controller';
import { AdminPostsService } from './admin-posts.service';
import { AdminUsersController } from './admin-users.controller';
import { AdminVisionsController } from './admin-visions.controller';
import { AdminVisionsService } from './admin-visions.service';

@Module({
  imports: [ConversationsModule, UsersModule],
  controllers: [
    AdminPostsController,
    AdminVisionsController,
    AdminCategoriesController,
    AdminUsersController,
    AdminJobsController,
  ],
  providers: [AdminGuard, AdminPostsService, AdminVisionsService],
})
export class AdminModule {}
