import { Controller, Get, Param, Query, Res, UseGuards } from '@nestjs/common';
import type { Response } from 'express';
import { setReadCache } from '../../common/http-cache';
import { parsePageNumber, toPaginationDto } from '../../common/pagination/page';
import type { ActingUser } from '../auth/auth.guard';
import { OptionalAuthGuard } from '../auth/optional-auth.guard';
import { toPostDto } from '../posts/post.dto';
import { PostsService } from '../posts/posts.service';
import { OptionalCurrentUser } from '../users/users.decorator';
import { toCategoryDto } from './category.dto';
import { CategoriesService } from './categories.service';

@Controller()
export class CategoriesController {
  constructor(
    private readonly categories: CategoriesService,
    private readonly posts: PostsService,
  ) {}

  @Get('categories')
  async list(@Res({ passthrough: true }) httpRes: Response) {
    const categories = await this.categories.listPublished();
    setReadCache(httpRes, { viewerUserId: null });
    return { data: categories.map(toCategoryDto) };
  }

  @UseGuards(OptionalAuthGuard)
  @Get('category/:categorySlug')
  async feed(
    @OptionalCurrentUser() viewer: ActingUser | null,
    @Param('categorySlug') categorySlug: string,
    @Query('page') page: unknown,
    @Res({ passthrough: true }) httpRes: Response,
  ) {
    const result = await this.posts.listCategoryFeed({
      categorySlug,
      now: new Date(),
      page: parsePageNumber(page),
    });
    setReadCache(httpRes, { viewerUserId: viewer?.id ?? null });
    return {
      data: {
        category: toCategoryDto(result.category),
        posts: result.page.items.map(toPostDto),
      },
      pagination: toPaginationDto(result.page),
    };
  }
}
