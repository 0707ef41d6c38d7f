import type { ObjectLiteral, SelectQueryBuilder } from 'typeorm';

export type CategoryVisibilityFields = { isPublished: boolean };

export type PostVisibilityFields = {
  isPublished: boolean;
  pubDate: Date;
  category: CategoryVisibilityFields | null;
};

export function isCategoryVisible(category: CategoryVisibilityFields): boolean {
  return category.isPublished;
}

/**
 * What an anonymous reader may see in a feed: published, not scheduled for later,
 * and not filed under a hidden category. Uncategorized posts count as visible.
 */
export function isPubliclyVisible(post: PostVisibilityFields, now: Date): boolean {
  if (!post.isPublished) return false;
  if (post.pubDate.getTime() > now.getTime()) return false;
  return post.category === null || isCategoryVisible(post.category);
}

/**
 * SQL form of `isPubliclyVisible`. The category alias must be LEFT JOINed so that
 * uncategorized posts survive the filter.
 */
export function applyPublicVisibility<T extends ObjectLiteral>(
  qb: SelectQueryBuilder<T>,
  aliases: { post: string; category: string },
  now: Date,
): SelectQueryBuilder<T> {
  const { post, category } = aliases;
  return qb
    .andWhere(`${post}.isPublished = :visiblePublished`, { visiblePublished: true })
    .andWhere(`${post}.pubDate <= :visibleNow`, { visibleNow: now })
    .andWhere(`(${category}.id IS NULL OR ${category}.isPublished = :visibleCategoryPublished)`, {
      visibleCategoryPublished: true,
    });
}
