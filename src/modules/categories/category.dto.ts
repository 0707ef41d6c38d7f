import type { Category } from '../database/entities';

export type CategoryDto = {
  id: number;
  title: string;
  description: string;
  slug: string;
};

export function toCategoryDto(category: Category): CategoryDto {
  return {
    id: category.id,
    title: category.title,
    description: category.description,
    slug: category.slug,
  };
}
