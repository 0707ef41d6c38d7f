import type { Post } from '../database/entities';

export type PostDto = {
  id: number;
  title: string;
  text: string;
  pubDate: string;
  isPublished: boolean;
  createdAt: string;
  author: { id: number; username: string } | null;
  category: { id: number; title: string; slug: string; isPublished: boolean } | null;
  /** Only present on feed items. */
  commentCount: number | null;
};

export function toPostDto(post: Post): PostDto {
  return {
    id: post.id,
    title: post.title,
    text: post.text,
    pubDate: post.pubDate.toISOString(),
    isPublished: post.isPublished,
    createdAt: post.createdAt.toISOString(),
    author: post.author ? { id: post.author.id, username: post.author.username } : null,
    category: post.category
      ? {
          id: post.category.id,
          title: post.category.title,
          slug: post.category.slug,
          isPublished: post.category.isPublished,
        }
      : null,
    commentCount: typeof post.commentCount === 'number' ? post.commentCount : null,
  };
}
