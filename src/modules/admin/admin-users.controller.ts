import { Body, Controller, Get, NotFoundException, Param, Patch, Query, UseGuards } from '@nestjs/common';
import { z } from 'zod';
import { UsersRepository } from '../users/users.repository';
import { AdminGuard } from './admin.guard';

const searchSchema = z.object({
  q: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(200).optional(),
  cursor: z.string().trim().min(1).optional(),
});

const updateUserSchema = z.object({
  visibleOnHome: z.boolean(),
});

@UseGuards(AdminGuard)
@Controller('admin/users')
export class AdminUsersController {
  constructor(private readonly users: UsersRepository) {}

  @Get()
  async list(@Query() query: unknown) {
    const { q, limit, cursor } = searchSchema.parse(query);
    const res = await this.users.list({ q: q ?? null, limit: limit ?? 50, cursor: cursor ?? null });
    return { data: res.users, pagination: { nextCursor: res.nextCursor } };
  }

  @Patch(':id')
  async update(@Param('id') id: string, @Body() body: unknown) {
    const { visibleOnHome } = updateUserSchema.parse(body ?? {});
    const user = await this.users.setVisibleOnHome(id, visibleOnHome);
    if (!user) throw new NotFoundException('User not found.');
    return { data: user };
  }
}
