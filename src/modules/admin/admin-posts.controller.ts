import { Body, Controller, Get, HttpCode, Post, Query, UseGuards } from '@nestjs/common';
import { z } from 'zod';
import { ThreadConversionService } from '../conversations/thread-conversion.service';
import { AdminGuard } from './admin.guard';
import { AdminPostsService, repliesMessage, visionsMessage } from './admin-posts.service';

const listSchema = z.object({
  assignment: z.enum(['visions', 'replies', 'unassigned']).optional(),
  q: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(200).optional(),
  cursor: z.string().trim().min(1).optional(),
});

const postIdsSchema = z.object({
  postIds: z.array(z.string().trim().min(1)).min(1).max(5_000),
});

@UseGuards(AdminGuard)
@Controller('admin/posts')
export class AdminPostsController {
  constructor(
    private readonly posts: AdminPostsService,
    private readonly conversions: ThreadConversionService,
  ) {}

  @Get()
  async list(@Query() query: unknown) {
    const parsed = listSchema.parse(query);
    const res = await this.posts.list({
      assignment: parsed.assignment ?? null,
      q: parsed.q ?? null,
      limit: parsed.limit ?? 50,
      cursor: parsed.cursor ?? null,
    });
    return { data: res.items, pagination: { nextCursor: res.nextCursor } };
  }

  @Post('make-visions')
  @HttpCode(200)
  async makeVisions(@Body() body: unknown) {
    const { postIds } = postIdsSchema.parse(body ?? {});
    const { converted } = await this.conversions.makeVisions(postIds);
    return { data: { converted, message: visionsMessage(converted) } };
  }

  @Post('make-replies')
  @HttpCode(200)
  async makeReplies(@Body() body: unknown) {
    const { postIds } = postIdsSchema.parse(body ?? {});
    const result = await this.conversions.makeReplies(postIds);
    return { data: { ...result, message: repliesMessage(result.succeeded, result.failed) } };
  }
}
