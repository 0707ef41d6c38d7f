import { DynamicModule, Global, Module } from '@nestjs/common';
import type { PageRange } from '../../src/common/pagination/page';
import { Category, Comment, Post, Session, User } from '../../src/modules/database/entities';
import {
  CategoriesRepository,
  CommentsRepository,
  PostsRepository,
  SessionsRepository,
  UsersRepository,
} from '../../src/modules/database/repositories';
import type {
  CommentCreateData,
  PostFeedFilter,
  PostWriteData,
  SessionCreateData,
  UserCreateData,
  UserProfileData,
} from '../../src/modules/database/repositories';
import { isPubliclyVisible } from '../../src/modules/posts/post-visibility';

/**
 * In-process stand-in for the Postgres tables. Rows are stored flat (foreign keys only);
 * the repositories below join them on read, the way the TypeORM queries do.
 */
export class InMemoryBlogStore {
  users: User[] = [];
  categories: Category[] = [];
  posts: Post[] = [];
  comments: Comment[] = [];
  sessions: Session[] = [];

  private seq = 0;
  private tick = Date.parse('2024-01-01T00:00:00.000Z');

  nextId(): number {
    this.seq += 1;
    return this.seq;
  }

  /** Strictly increasing creation timestamps, one second apart. */
  nextCreatedAt(): Date {
    this.tick += 1000;
    return new Date(this.tick);
  }

  addUser(input: { username: string; firstName?: string; lastName?: string; email?: string }): User {
    const user = Object.assign(new User(), {
      id: this.nextId(),
      username: input.username,
      firstName: input.firstName ?? '',
      lastName: input.lastName ?? '',
      email: input.email ?? '',
      passwordHash: 'scrypt$00$00',
      createdAt: this.nextCreatedAt(),
    });
    this.users.push(user);
    return user;
  }

  addCategory(input: { slug: string; title?: string; isPublished?: boolean }): Category {
    const category = Object.assign(new Category(), {
      id: this.nextId(),
      slug: input.slug,
      title: input.title ?? input.slug,
      description: '',
      isPublished: input.isPublished ?? true,
      createdAt: this.nextCreatedAt(),
    });
    this.categories.push(category);
    return category;
  }

  addPost(input: {
    author: User;
    title: string;
    pubDate: Date;
    text?: string;
    isPublished?: boolean;
    category?: Category | null;
  }): Post {
    const post = Object.assign(new Post(), {
      id: this.nextId(),
      title: input.title,
      text: input.text ?? `${input.title} body`,
      pubDate: input.pubDate,
      isPublished: input.isPublished ?? true,
      createdAt: this.nextCreatedAt(),
      authorId: input.author.id,
      categoryId: input.category?.id ?? null,
    });
    this.posts.push(post);
    return post;
  }

  addComment(input: { post: Post; author: User; text: string }): Comment {
    const comment = Object.assign(new Comment(), {
      id: this.nextId(),
      text: input.text,
      createdAt: this.nextCreatedAt(),
      postId: input.post.id,
      authorId: input.author.id,
    });
    this.comments.push(comment);
    return comment;
  }

  userById(id: number): User | null {
    return this.users.find((u) => u.id === id) ?? null;
  }

  categoryById(id: number | null): Category | null {
    if (id === null) return null;
    return this.categories.find((c) => c.id === id) ?? null;
  }

  postById(id: number): Post | null {
    return this.posts.find((p) => p.id === id) ?? null;
  }

  commentById(id: number): Comment | null {
    return this.comments.find((c) => c.id === id) ?? null;
  }
}

function compareFeedOrder(a: Post, b: Post): number {
  const byDate = b.pubDate.getTime() - a.pubDate.getTime();
  if (byDate !== 0) return byDate;
  if (a.title !== b.title) return a.title < b.title ? -1 : 1;
  return a.id - b.id;
}

export class InMemoryPostsRepository extends PostsRepository {
  constructor(private readonly store: InMemoryBlogStore) {
    super();
  }

  private hydrate(row: Post): Post {
    const author = this.store.userById(row.authorId);
    if (!author) throw new Error(`post ${row.id} has no author row`);
    return Object.assign(new Post(), row, {
      author,
      category: this.store.categoryById(row.categoryId),
    });
  }

  private matching(filter: PostFeedFilter): Post[] {
    const rows = this.store.posts.map((p) => this.hydrate(p));
    if (filter.kind === 'author') return rows.filter((p) => p.authorId === filter.authorId);
    return rows.filter(
      (p) =>
        isPubliclyVisible(p, filter.now) && (filter.categoryId === undefined || p.categoryId === filter.categoryId),
    );
  }

  async countFeed(filter: PostFeedFilter): Promise<number> {
    return this.matching(filter).length;
  }

  async findFeed(filter: PostFeedFilter, range: PageRange): Promise<Post[]> {
    return this.matching(filter)
      .sort(compareFeedOrder)
      .slice(range.offset, range.offset + range.limit)
      .map((p) =>
        Object.assign(p, { commentCount: this.store.comments.filter((c) => c.postId === p.id).length }),
      );
  }

  async findById(id: number): Promise<Post | null> {
    const row = this.store.postById(id);
    return row ? this.hydrate(row) : null;
  }

  async create(data: PostWriteData): Promise<Post> {
    const row = Object.assign(new Post(), data, { id: this.store.nextId(), createdAt: this.store.nextCreatedAt() });
    this.store.posts.push(row);
    return this.hydrate(row);
  }

  async update(id: number, data: PostWriteData): Promise<Post> {
    const row = this.store.postById(id);
    if (!row) throw new Error(`post ${id} not found`);
    Object.assign(row, data);
    return this.hydrate(row);
  }

  async delete(id: number): Promise<void> {
    this.store.posts = this.store.posts.filter((p) => p.id !== id);
    this.store.comments = this.store.comments.filter((c) => c.postId !== id);
  }
}

export class InMemoryCommentsRepository extends CommentsRepository {
  constructor(private readonly store: InMemoryBlogStore) {
    super();
  }

  private hydrate(row: Comment): Comment {
    const author = this.store.userById(row.authorId);
    if (!author) throw new Error(`comment ${row.id} has no author row`);
    return Object.assign(new Comment(), row, { author });
  }

  async findByPost(postId: number): Promise<Comment[]> {
    return this.store.comments
      .filter((c) => c.postId === postId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id)
      .map((c) => this.hydrate(c));
  }

  async findById(id: number): Promise<Comment | null> {
    const row = this.store.commentById(id);
    return row ? this.hydrate(row) : null;
  }

  async create(data: CommentCreateData): Promise<Comment> {
    const row = Object.assign(new Comment(), data, { id: this.store.nextId(), createdAt: this.store.nextCreatedAt() });
    this.store.comments.push(row);
    return this.hydrate(row);
  }

  async update(id: number, data: { text: string }): Promise<Comment> {
    const row = this.store.commentById(id);
    if (!row) throw new Error(`comment ${id} not found`);
    row.text = data.text;
    return this.hydrate(row);
  }

  async delete(id: number): Promise<void> {
    this.store.comments = this.store.comments.filter((c) => c.id !== id);
  }
}

export class InMemoryCategoriesRepository extends CategoriesRepository {
  constructor(private readonly store: InMemoryBlogStore) {
    super();
  }

  async findBySlug(slug: string): Promise<Category | null> {
    return this.store.categories.find((c) => c.slug === slug) ?? null;
  }

  async findById(id: number): Promise<Category | null> {
    return this.store.categoryById(id);
  }

  async findPublished(): Promise<Category[]> {
    return this.store.categories
      .filter((c) => c.isPublished)
      .sort((a, b) => (a.title === b.title ? a.id - b.id : a.title < b.title ? -1 : 1));
  }
}

export class InMemoryUsersRepository extends UsersRepository {
  constructor(private readonly store: InMemoryBlogStore) {
    super();
  }

  async findById(id: number): Promise<User | null> {
    return this.store.userById(id);
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.store.users.find((u) => u.username === username) ?? null;
  }

  async create(data: UserCreateData): Promise<User> {
    const user = Object.assign(new User(), data, { id: this.store.nextId(), createdAt: this.store.nextCreatedAt() });
    this.store.users.push(user);
    return user;
  }

  async updateProfile(id: number, data: UserProfileData): Promise<User> {
    const user = this.store.userById(id);
    if (!user) throw new Error(`user ${id} not found`);
    return Object.assign(user, data);
  }
}

export class InMemorySessionsRepository extends SessionsRepository {
  constructor(private readonly store: InMemoryBlogStore) {
    super();
  }

  async create(data: SessionCreateData): Promise<Session> {
    const session = Object.assign(new Session(), data, {
      id: `session-${this.store.nextId()}`,
      revokedAt: null,
      createdAt: this.store.nextCreatedAt(),
    });
    this.store.sessions.push(session);
    return session;
  }

  async findActiveByTokenHash(tokenHash: string, now: Date): Promise<Session | null> {
    const session = this.store.sessions.find(
      (s) => s.tokenHash === tokenHash && s.revokedAt === null && s.expiresAt.getTime() > now.getTime(),
    );
    if (!session) return null;
    const user = this.store.userById(session.userId);
    return user ? Object.assign(new Session(), session, { user }) : null;
  }

  async revokeByTokenHash(tokenHash: string, now: Date): Promise<void> {
    for (const s of this.store.sessions) {
      if (s.tokenHash === tokenHash && s.revokedAt === null) s.revokedAt = now;
    }
  }
}

export function inMemoryRepositories(store: InMemoryBlogStore) {
  return {
    posts: new InMemoryPostsRepository(store),
    comments: new InMemoryCommentsRepository(store),
    categories: new InMemoryCategoriesRepository(store),
    users: new InMemoryUsersRepository(store),
    sessions: new InMemorySessionsRepository(store),
  };
}

/** Provides the same repository tokens as DatabaseModule, backed by one store. */
@Global()
@Module({})
export class InMemoryDatabaseModule {
  static forStore(store: InMemoryBlogStore): DynamicModule {
    const repos = inMemoryRepositories(store);
    return {
      module: InMemoryDatabaseModule,
      global: true,
      providers: [
        { provide: InMemoryBlogStore, useValue: store },
        { provide: PostsRepository, useValue: repos.posts },
        { provide: CommentsRepository, useValue: repos.comments },
        { provide: CategoriesRepository, useValue: repos.categories },
        { provide: UsersRepository, useValue: repos.users },
        { provide: SessionsRepository, useValue: repos.sessions },
      ],
      exports: [InMemoryBlogStore, PostsRepository, CommentsRepository, CategoriesRepository, UsersRepository, SessionsRepository],
    };
  }
}
