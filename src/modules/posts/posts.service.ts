import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ok, redirectTo } from '../../common/outcome';
import type { Outcome } from '../../common/outcome';
import { canMutate } from '../../common/ownership';
import { paginate, pageRequest } from '../../common/pagination/page';
import type { Page, PageNumber } from '../../common/pagination/page';
import { postDetailPath, profilePath } from '../../common/paths';
import type { ActingUser } from '../auth/auth.guard';
import { emptyCommentForm } from '../comments/comment-form';
import type { CommentFormDescriptor } from '../comments/comment-form';
import type { Category, Comment, Post, User } from '../database/entities';
import { CategoriesRepository, CommentsRepository, PostsRepository, UsersRepository } from '../database/repositories';
import type { PostFeedFilter } from '../database/repositories';
import { isCategoryVisible } from './post-visibility';

/** Editable post fields, as accepted by the create/edit forms. */
export type PostFields = {
  title: string;
  text: string;
  pubDate: Date;
  isPublished: boolean;
  categoryId: number | null;
};

export type PostDetail = {
  post: Post;
  comments: Comment[];
  commentForm: CommentFormDescriptor;
};

@Injectable()
export class PostsService {
  private readonly logger = new Logger(PostsService.name);

  constructor(
    private readonly posts: PostsRepository,
    private readonly comments: CommentsRepository,
    private readonly categories: CategoriesRepository,
    private readonly users: UsersRepository,
  ) {}

  private feedPage(filter: PostFeedFilter, page: PageNumber): Promise<Page<Post>> {
    return paginate(pageRequest(page), {
      count: () => this.posts.countFeed(filter),
      fetch: (range) => this.posts.findFeed(filter, range),
    });
  }

  /** Home page: every publicly visible post, newest first. `now` must be read per request. */
  listHomeFeed(params: { now: Date; page: PageNumber }): Promise<Page<Post>> {
    return this.feedPage({ kind: 'public', now: params.now }, params.page);
  }

  async listCategoryFeed(params: {
    categorySlug: string;
    now: Date;
    page: PageNumber;
  }): Promise<{ category: Category; page: Page<Post> }> {
    const category = await this.categories.findBySlug(params.categorySlug);
    if (!category || !isCategoryVisible(category)) throw new NotFoundException('Category not found.');

    const page = await this.feedPage({ kind: 'public', now: params.now, categoryId: category.id }, params.page);
    return { category, page };
  }

  /**
   * Profile page: all of the author's posts, including unpublished and scheduled ones.
   * Unlike the public feeds there is no visibility filter here.
   */
  async listAuthorFeed(params: { username: string; page: PageNumber }): Promise<{ profile: User; page: Page<Post> }> {
    const profile = await this.users.findByUsername(params.username);
    if (!profile) throw new NotFoundException('User not found.');

    const page = await this.feedPage({ kind: 'author', authorId: profile.id }, params.page);
    return { profile, page };
  }

  /** Direct lookups are not visibility-filtered: any existing id resolves. */
  async getPostDetail(postId: number): Promise<PostDetail> {
    const post = await this.posts.findById(postId);
    if (!post) throw new NotFoundException('Post not found.');

    const comments = await this.comments.findByPost(post.id);
    return { post, comments, commentForm: emptyCommentForm(post.id) };
  }

  private async assertCategoryChoice(categoryId: number | null) {
    if (categoryId === null) return;
    const category = await this.categories.findById(categoryId);
    if (!category) throw new BadRequestException('Select a valid category.');
  }

  /** Resolves a post for writing. Non-authors get a redirect back to the post instead of an error. */
  private async ownedPost(actor: ActingUser, postId: number): Promise<Outcome<Post>> {
    const post = await this.posts.findById(postId);
    if (!post) throw new NotFoundException('Post not found.');
    if (!canMutate(actor, post.authorId)) {
      this.logger.debug(`post write refused post=${post.id} actor=${actor.id}`);
      return redirectTo(postDetailPath(post.id));
    }
    return ok(post, postDetailPath(post.id));
  }

  preparePostEdit(params: { actor: ActingUser; postId: number }): Promise<Outcome<Post>> {
    return this.ownedPost(params.actor, params.postId);
  }

  async createPost(params: { actor: ActingUser; fields: PostFields }): Promise<Outcome<Post>> {
    const { actor, fields } = params;
    await this.assertCategoryChoice(fields.categoryId);

    const post = await this.posts.create({ ...fields, authorId: actor.id });
    this.logger.log(`post created id=${post.id} author=${actor.id}`);
    return ok(post, profilePath(actor.username));
  }

  async updatePost(params: { actor: ActingUser; postId: number; fields: PostFields }): Promise<Outcome<Post>> {
    const { actor, fields } = params;
    const owned = await this.ownedPost(actor, params.postId);
    if (owned.kind === 'redirect') return owned;

    await this.assertCategoryChoice(fields.categoryId);
    const post = await this.posts.update(owned.value.id, { ...fields, authorId: actor.id });
    this.logger.log(`post updated id=${post.id}`);
    return ok(post, postDetailPath(post.id));
  }

  async deletePost(params: { actor: ActingUser; postId: number }): Promise<Outcome<{ id: number }>> {
    const { actor } = params;
    const owned = await this.ownedPost(actor, params.postId);
    if (owned.kind === 'redirect') return owned;

    await this.posts.delete(owned.value.id);
    this.logger.log(`post deleted id=${owned.value.id}`);
    return ok({ id: owned.value.id }, profilePath(actor.username));
  }
}
