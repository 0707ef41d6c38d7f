import { Injectable } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { Comment } from '../entities';

export type CommentCreateData = { text: string; postId: number; authorId: number };

export abstract class CommentsRepository {
  /** Oldest first, each with its author. */
  abstract findByPost(postId: number): Promise<Comment[]>;
  abstract findById(id: number): Promise<Comment | null>;
  abstract create(data: CommentCreateData): Promise<Comment>;
  abstract update(id: number, data: { text: string }): Promise<Comment>;
  abstract delete(id: number): Promise<void>;
}

@Injectable()
export class TypeOrmCommentsRepository extends CommentsRepository {
  constructor(
    @InjectRepository(Comment) private readonly comments: Repository<Comment>,
    @InjectDataSource() private readonly dataSource: DataSource,
  ) {
    super();
  }

  findByPost(postId: number): Promise<Comment[]> {
    return this.comments.find({
      where: { postId },
      relations: { author: true },
      order: { createdAt: 'ASC', id: 'ASC' },
    });
  }

  findById(id: number): Promise<Comment | null> {
    return this.comments.findOne({ where: { id }, relations: { author: true } });
  }

  create(data: CommentCreateData): Promise<Comment> {
    return this.dataSource.transaction(async (manager) => {
      const saved = await manager.save(manager.create(Comment, data));
      return manager.findOneOrFail(Comment, { where: { id: saved.id }, relations: { author: true } });
    });
  }

  update(id: number, data: { text: string }): Promise<Comment> {
    return this.dataSource.transaction(async (manager) => {
      await manager.update(Comment, { id }, { text: data.text });
      return manager.findOneOrFail(Comment, { where: { id }, relations: { author: true } });
    });
  }

  async delete(id: number): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      await manager.delete(Comment, { id });
    });
  }
}
