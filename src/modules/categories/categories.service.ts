import { Injectable } from '@nestjs/common';
import type { Category } from '../database/entities';
import { CategoriesRepository } from '../database/repositories';

@Injectable()
export class CategoriesService {
  constructor(private readonly categories: CategoriesRepository) {}

  listPublished(): Promise<Category[]> {
    return this.categories.findPublished();
  }
}
