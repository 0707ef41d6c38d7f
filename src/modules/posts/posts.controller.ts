import { Body, Controller, Delete, Get, Param, Patch, Post, Query, Res, UseGuards } from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import type { Response } from 'express';
import { z } from 'zod';
import { setReadCache } from '../../common/http-cache';
import { respondWithOutcome } from '../../common/outcome';
import { parsePageNumber, toPaginationDto } from '../../common/pagination/page';
import { MAX_ROW_ID, ParseIdPipe } from '../../common/params';
import { rateLimitLimit, rateLimitTtl } from '../../common/throttling/rate-limit.resolver';
import { AuthGuard } from '../auth/auth.guard';
import type { ActingUser } from '../auth/auth.guard';
import { OptionalAuthGuard } from '../auth/optional-auth.guard';
import { toCommentDto } from '../comments/comment.dto';
import { CurrentUser, OptionalCurrentUser } from '../users/users.decorator';
import { toPostDto } from './post.dto';
import { PostsService } from './posts.service';

const postFieldsSchema = z.object({
  title: z.string().trim().min(1, 'Title is required.').max(256),
  text: z.string().trim().min(1, 'Text is required.'),
  pubDate: z.coerce.date(),
  isPublished: z.boolean(),
  categoryId: z.coerce.number().int().positive().max(MAX_ROW_ID).nullable().optional().default(null),
});

// New posts default to "publish now".
const createPostSchema = postFieldsSchema.extend({
  pubDate: z.coerce.date().optional(),
  isPublished: z.boolean().optional().default(true),
});

// Edits resubmit the whole (prefilled) form.
const updatePostSchema = postFieldsSchema;

@Controller('posts')
export class PostsController {
  constructor(private readonly posts: PostsService) {}

  @UseGuards(OptionalAuthGuard)
  @Get()
  async list(
    @OptionalCurrentUser() viewer: ActingUser | null,
    @Query('page') page: unknown,
    @Res({ passthrough: true }) httpRes: Response,
  ) {
    const result = await this.posts.listHomeFeed({ now: new Date(), page: parsePageNumber(page) });
    setReadCache(httpRes, { viewerUserId: viewer?.id ?? null });
    return { data: result.items.map(toPostDto), pagination: toPaginationDto(result) };
  }

  @UseGuards(OptionalAuthGuard)
  @Get(':postId')
  async detail(
    @OptionalCurrentUser() viewer: ActingUser | null,
    @Param('postId', ParseIdPipe) postId: number,
    @Res({ passthrough: true }) httpRes: Response,
  ) {
    const { post, comments, commentForm } = await this.posts.getPostDetail(postId);
    setReadCache(httpRes, { viewerUserId: viewer?.id ?? null });
    return {
      data: {
        post: toPostDto(post),
        comments: comments.map(toCommentDto),
        commentForm,
      },
    };
  }

  @UseGuards(AuthGuard)
  @Get(':postId/edit')
  async edit(
    @CurrentUser() actor: ActingUser,
    @Param('postId', ParseIdPipe) postId: number,
    @Res({ passthrough: true }) httpRes: Response,
  ) {
    const outcome = await this.posts.preparePostEdit({ actor, postId });
    return respondWithOutcome(httpRes, outcome, toPostDto);
  }

  @UseGuards(AuthGuard)
  @Throttle({
    default: {
      limit: rateLimitLimit('write', 60),
      ttl: rateLimitTtl('write', 60),
    },
  })
  @Post()
  async create(@CurrentUser() actor: ActingUser, @Body() body: unknown, @Res({ passthrough: true }) httpRes: Response) {
    const parsed = createPostSchema.parse(body);
    const outcome = await this.posts.createPost({
      actor,
      fields: { ...parsed, pubDate: parsed.pubDate ?? new Date() },
    });
    return respondWithOutcome(httpRes, outcome, toPostDto);
  }

  @UseGuards(AuthGuard)
  @Throttle({
    default: {
      limit: rateLimitLimit('write', 60),
      ttl: rateLimitTtl('write', 60),
    },
  })
  @Patch(':postId')
  async update(
    @CurrentUser() actor: ActingUser,
    @Param('postId', ParseIdPipe) postId: number,
    @Body() body: unknown,
    @Res({ passthrough: true }) httpRes: Response,
  ) {
    // Ownership is settled before the form is looked at: a stranger's edit is a redirect, never a 400.
    const editable = await this.posts.preparePostEdit({ actor, postId });
    if (editable.kind === 'redirect') return respondWithOutcome(httpRes, editable, toPostDto);

    const fields = updatePostSchema.parse(body);
    const outcome = await this.posts.updatePost({ actor, postId, fields });
    return respondWithOutcome(httpRes, outcome, toPostDto);
  }

  @UseGuards(AuthGuard)
  @Throttle({
    default: {
      limit: rateLimitLimit('write', 60),
      ttl: rateLimitTtl('write', 60),
    },
  })
  @Delete(':postId')
  async remove(
    @CurrentUser() actor: ActingUser,
    @Param('postId', ParseIdPipe) postId: number,
    @Res({ passthrough: true }) httpRes: Response,
  ) {
    const outcome = await this.posts.deletePost({ actor, postId });
    return respondWithOutcome(httpRes, outcome, (deleted) => deleted);
  }
}
