import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ok, redirectTo } from '../../common/outcome';
import type { Outcome } from '../../common/outcome';
import { canMutate } from '../../common/ownership';
import { postDetailPath } from '../../common/paths';
import type { ActingUser } from '../auth/auth.guard';
import type { Comment, Post } from '../database/entities';
import { CommentsRepository, PostsRepository } from '../database/repositories';

@Injectable()
export class CommentsService {
  private readonly logger = new Logger(CommentsService.name);

  constructor(
    private readonly comments: CommentsRepository,
    private readonly posts: PostsRepository,
  ) {}

  /** The post a new comment would attach to. Checked before the form is read. */
  async commentTarget(postId: number): Promise<Post> {
    const post = await this.posts.findById(postId);
    if (!post) throw new NotFoundException('Post not found.');
    return post;
  }

  async createComment(params: { actor: ActingUser; postId: number; text: string }): Promise<Outcome<Comment>> {
    const { actor, text } = params;
    const post = await this.commentTarget(params.postId);

    const comment = await this.comments.create({ text, postId: post.id, authorId: actor.id });
    this.logger.log(`comment created id=${comment.id} post=${post.id} author=${actor.id}`);
    return ok(comment, postDetailPath(post.id));
  }

  /** Non-authors are sent back to the parent post; nothing is written. */
  private async ownedComment(actor: ActingUser, commentId: number): Promise<Outcome<Comment>> {
    const comment = await this.comments.findById(commentId);
    if (!comment) throw new NotFoundException('Comment not found.');
    if (!canMutate(actor, comment.authorId)) {
      this.logger.debug(`comment write refused comment=${comment.id} actor=${actor.id}`);
      return redirectTo(postDetailPath(comment.postId));
    }
    return ok(comment, postDetailPath(comment.postId));
  }

  prepareCommentEdit(params: { actor: ActingUser; commentId: number }): Promise<Outcome<Comment>> {
    return this.ownedComment(params.actor, params.commentId);
  }

  async updateComment(params: { actor: ActingUser; commentId: number; text: string }): Promise<Outcome<Comment>> {
    const owned = await this.ownedComment(params.actor, params.commentId);
    if (owned.kind === 'redirect') return owned;

    const comment = await this.comments.update(owned.value.id, { text: params.text });
    this.logger.log(`comment updated id=${comment.id}`);
    return ok(comment, postDetailPath(comment.postId));
  }

  async deleteComment(params: {
    actor: ActingUser;
    commentId: number;
  }): Promise<Outcome<{ id: number; postId: number }>> {
    const owned = await this.ownedComment(params.actor, params.commentId);
    if (owned.kind === 'redirect') return owned;

    const { id, postId } = owned.value;
    await this.comments.delete(id);
    this.logger.log(`comment deleted id=${id} post=${postId}`);
    return ok({ id, postId }, postDetailPath(postId));
  }
}
