import { Body, Controller, Delete, Get, Param, Patch, Post, Query, UseGuards } from '@nestjs/common';
import { z } from 'zod';
import { AdminGuard } from './admin.guard';
import { AdminVisionsService } from './admin-visions.service';

const listSchema = z.object({
  categoryId: z.string().trim().min(1).optional(),
  featured: z.enum(['true', 'false']).optional(),
  q: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(200).optional(),
});

const updateVisionSchema = z
  .object({
    text: z.string().trim().min(1).max(5_000).optional(),
    categoryId: z.union([z.string().trim().min(1), z.null()]).optional(),
    featured: z.boolean().optional(),
  })
  .refine((v) => v.text !== undefined || v.categoryId !== undefined || v.featured !== undefined, 'Nothing to update');

const shareSchema = z.object({
  userId: z.string().trim().min(1).nullish(),
  externalId: z.string().trim().min(1).nullish(),
});

@UseGuards(AdminGuard)
@Controller('admin/visions')
export class AdminVisionsController {
  constructor(private readonly visions: AdminVisionsService) {}

  @Get()
  async list(@Query() query: unknown) {
    const parsed = listSchema.parse(query);
    return {
      data: await this.visions.list({
        categoryId: parsed.categoryId ?? null,
        featured: parsed.featured === undefined ? null : parsed.featured === 'true',
        q: parsed.q ?? null,
        limit: parsed.limit ?? 50,
      }),
    };
  }

  @Patch(':id')
  async update(@Param('id') id: string, @Body() body: unknown) {
    const parsed = updateVisionSchema.parse(body ?? {});
    return { data: await this.visions.update(id, parsed) };
  }

  @Post(':id/supporters/:userId')
  async addSupporter(@Param('id') id: string, @Param('userId') userId: string) {
    return { data: await this.visions.addSupporter(id, userId) };
  }

  @Delete(':id/supporters/:userId')
  async removeSupporter(@Param('id') id: string, @Param('userId') userId: string) {
    return { data: await this.visions.removeSupporter(id, userId) };
  }

  @Post(':id/shares')
  async addShare(@Param('id') id: string, @Body() body: unknown) {
    const parsed = shareSchema.parse(body ?? {});
    return { data: await this.visions.addShare(id, { userId: parsed.userId ?? null, externalId: parsed.externalId ?? null }) };
  }
}
