import { Body, Controller, Delete, Get, Param, Patch, Post, Res, UseGuards } from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import type { Response } from 'express';
import { z } from 'zod';
import { respondWithOutcome } from '../../common/outcome';
import { ParseIdPipe } from '../../common/params';
import { rateLimitLimit, rateLimitTtl } from '../../common/throttling/rate-limit.resolver';
import { AuthGuard } from '../auth/auth.guard';
import type { ActingUser } from '../auth/auth.guard';
import { CurrentUser } from '../users/users.decorator';
import { COMMENT_TEXT_MAX_LENGTH } from './comment-form';
import { toCommentDto } from './comment.dto';
import { CommentsService } from './comments.service';

const commentSchema = z.object({
  text: z.string().trim().min(1, 'Comment text is required.').max(COMMENT_TEXT_MAX_LENGTH),
});

@UseGuards(AuthGuard)
@Throttle({
  default: {
    limit: rateLimitLimit('write', 60),
    ttl: rateLimitTtl('write', 60),
  },
})
@Controller()
export class CommentsController {
  constructor(private readonly comments: CommentsService) {}

  @Post('posts/:postId/comments')
  async create(
    @CurrentUser() actor: ActingUser,
    @Param('postId', ParseIdPipe) postId: number,
    @Body() body: unknown,
    @Res({ passthrough: true }) httpRes: Response,
  ) {
    await this.comments.commentTarget(postId);
    const { text } = commentSchema.parse(body);
    const outcome = await this.comments.createComment({ actor, postId, text });
    return respondWithOutcome(httpRes, outcome, toCommentDto);
  }

  @Get('comments/:commentId/edit')
  async edit(
    @CurrentUser() actor: ActingUser,
    @Param('commentId', ParseIdPipe) commentId: number,
    @Res({ passthrough: true }) httpRes: Response,
  ) {
    const outcome = await this.comments.prepareCommentEdit({ actor, commentId });
    return respondWithOutcome(httpRes, outcome, toCommentDto);
  }

  @Patch('comments/:commentId')
  async update(
    @CurrentUser() actor: ActingUser,
    @Param('commentId', ParseIdPipe) commentId: number,
    @Body() body: unknown,
    @Res({ passthrough: true }) httpRes: Response,
  ) {
    const editable = await this.comments.prepareCommentEdit({ actor, commentId });
    if (editable.kind === 'redirect') return respondWithOutcome(httpRes, editable, toCommentDto);

    const { text } = commentSchema.parse(body);
    const outcome = await this.comments.updateComment({ actor, commentId, text });
    return respondWithOutcome(httpRes, outcome, toCommentDto);
  }

  @Delete('comments/:commentId')
  async remove(
    @CurrentUser() actor: ActingUser,
    @Param('commentId', ParseIdPipe) commentId: number,
    @Res({ passthrough: true }) httpRes: Response,
  ) {
    const outcome = await this.comments.deleteComment({ actor, commentId });
    return respondWithOutcome(httpRes, outcome, (deleted) => deleted);
  }
}
