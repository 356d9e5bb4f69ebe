import { Body, Controller, Get, Post, UseGuards } from '@nestjs/common';
import { z } from 'zod';
import { AdminGuard } from './admin.guard';
import { AdminVisionsService } from './admin-visions.service';

const createCategorySchema = z.object({
  name: z.string().trim().min(1).max(100),
});

@UseGuards(AdminGuard)
@Controller('admin/categories')
export class AdminCategoriesController {
  constructor(private readonly visions: AdminVisionsService) {}

  @Get()
  async list() {
    return { data: await this.visions.listCategories() };
  }

  @Post()
  async create(@Body() body: unknown) {
    const { name } = createCategorySchema.parse(body ?? {});
    return { data: await this.visions.createCategory(name) };
  }
}
