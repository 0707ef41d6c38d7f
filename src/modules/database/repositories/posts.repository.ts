import { Injectable } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository, SelectQueryBuilder } from 'typeorm';
import type { PageRange } from '../../../common/pagination/page';
import { applyPublicVisibility } from '../../posts/post-visibility';
import { Post } from '../entities';

/** Which posts a feed shows: the public (visibility-filtered) set, or everything by one author. */
export type PostFeedFilter =
  | { kind: 'public'; now: Date; categoryId?: number }
  | { kind: 'author'; authorId: number };

export type PostWriteData = {
  title: string;
  text: string;
  pubDate: Date;
  isPublished: boolean;
  categoryId: number | null;
  authorId: number;
};

export abstract class PostsRepository {
  abstract countFeed(filter: PostFeedFilter): Promise<number>;
  /** Ordered by pubDate desc, title asc, id asc; each post carries `commentCount`. */
  abstract findFeed(filter: PostFeedFilter, range: PageRange): Promise<Post[]>;
  /** With author and category loaded. */
  abstract findById(id: number): Promise<Post | null>;
  abstract create(data: PostWriteData): Promise<Post>;
  abstract update(id: number, data: PostWriteData): Promise<Post>;
  /** Comments go with the post (FK cascade). */
  abstract delete(id: number): Promise<void>;
}

@Injectable()
export class TypeOrmPostsRepository extends PostsRepository {
  constructor(
    @InjectRepository(Post) private readonly posts: Repository<Post>,
    @InjectDataSource() private readonly dataSource: DataSource,
  ) {
    super();
  }

  private feedQuery(filter: PostFeedFilter): SelectQueryBuilder<Post> {
    const qb = this.posts
      .createQueryBuilder('post')
      .leftJoinAndSelect('post.author', 'author')
      .leftJoinAndSelect('post.category', 'category');

    if (filter.kind === 'author') {
      return qb.andWhere('post.authorId = :authorId', { authorId: filter.authorId });
    }

    applyPublicVisibility(qb, { post: 'post', category: 'category' }, filter.now);
    if (filter.categoryId !== undefined) {
      qb.andWhere('post.categoryId = :categoryId', { categoryId: filter.categoryId });
    }
    return qb;
  }

  countFeed(filter: PostFeedFilter): Promise<number> {
    return this.feedQuery(filter).getCount();
  }

  findFeed(filter: PostFeedFilter, range: PageRange): Promise<Post[]> {
    return this.feedQuery(filter)
      .loadRelationCountAndMap('post.commentCount', 'post.comments')
      .orderBy('post.pubDate', 'DESC')
      .addOrderBy('post.title', 'ASC')
      .addOrderBy('post.id', 'ASC')
      .skip(range.offset)
      .take(range.limit)
      .getMany();
  }

  findById(id: number): Promise<Post | null> {
    return this.posts.findOne({ where: { id }, relations: { author: true, category: true } });
  }

  create(data: PostWriteData): Promise<Post> {
    return this.dataSource.transaction(async (manager) => {
      const saved = await manager.save(manager.create(Post, data));
      return manager.findOneOrFail(Post, { where: { id: saved.id }, relations: { author: true, category: true } });
    });
  }

  update(id: number, data: PostWriteData): Promise<Post> {
    return this.dataSource.transaction(async (manager) => {
      await manager.update(Post, { id }, data);
      return manager.findOneOrFail(Post, { where: { id }, relations: { author: true, category: true } });
    });
  }

  async delete(id: number): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      await manager.delete(Post, { id });
    });
  }
}
