import { Body, Controller, Get, Param, Patch, Query, Res, UseGuards } from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import type { Response } from 'express';
import { z } from 'zod';
import { setReadCache } from '../../common/http-cache';
import { respondWithOutcome } from '../../common/outcome';
import { parsePageNumber, toPaginationDto } from '../../common/pagination/page';
import { rateLimitLimit, rateLimitTtl } from '../../common/throttling/rate-limit.resolver';
import { optionalEmailSchema, personNameSchema, usernameSchema } from '../auth/auth.schemas';
import { AuthGuard } from '../auth/auth.guard';
import type { ActingUser } from '../auth/auth.guard';
import { OptionalAuthGuard } from '../auth/optional-auth.guard';
import { toPostDto } from '../posts/post.dto';
import { PostsService } from '../posts/posts.service';
import { toAccountDto, toProfileDto } from './user.dto';
import { CurrentUser, OptionalCurrentUser } from './users.decorator';
import { UsersService } from './users.service';

const profileSchema = z.object({
  username: usernameSchema,
  firstName: personNameSchema,
  lastName: personNameSchema,
  email: optionalEmailSchema,
});

@Controller('profile')
export class UsersController {
  constructor(
    private readonly users: UsersService,
    private readonly posts: PostsService,
  ) {}

  @UseGuards(OptionalAuthGuard)
  @Get(':username')
  async profile(
    @OptionalCurrentUser() viewer: ActingUser | null,
    @Param('username') username: string,
    @Query('page') page: unknown,
    @Res({ passthrough: true }) httpRes: Response,
  ) {
    const result = await this.posts.listAuthorFeed({ username, page: parsePageNumber(page) });
    setReadCache(httpRes, { viewerUserId: viewer?.id ?? null });
    return {
      data: {
        profile: toProfileDto(result.profile),
        posts: result.page.items.map(toPostDto),
      },
      pagination: toPaginationDto(result.page),
    };
  }

  @UseGuards(AuthGuard)
  @Throttle({
    default: {
      limit: rateLimitLimit('write', 60),
      ttl: rateLimitTtl('write', 60),
    },
  })
  @Patch(':username')
  async update(
    @CurrentUser() actor: ActingUser,
    @Param('username') username: string,
    @Body() body: unknown,
    @Res({ passthrough: true }) httpRes: Response,
  ) {
    // Someone else's profile is a 404 whatever the body holds.
    await this.users.prepareProfileEdit({ actor, username });
    const fields = profileSchema.parse(body);
    const outcome = await this.users.updateProfile({ actor, username, fields });
    return respondWithOutcome(httpRes, outcome, toAccountDto);
  }
}
