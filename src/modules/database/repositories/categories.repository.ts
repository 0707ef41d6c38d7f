import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Category } from '../entities';

export abstract class CategoriesRepository {
  abstract findBySlug(slug: string): Promise<Category | null>;
  abstract findById(id: number): Promise<Category | null>;
  abstract findPublished(): Promise<Category[]>;
}

@Injectable()
export class TypeOrmCategoriesRepository extends CategoriesRepository {
  constructor(@InjectRepository(Category) private readonly categories: Repository<Category>) {
    super();
  }

  findBySlug(slug: string): Promise<Category | null> {
    return this.categories.findOne({ where: { slug } });
  }

  findById(id: number): Promise<Category | null> {
    return this.categories.findOne({ where: { id } });
  }

  findPublished(): Promise<Category[]> {
    return this.categories.find({ where: { isPublished: true }, order: { title: 'ASC', id: 'ASC' } });
  }
}
