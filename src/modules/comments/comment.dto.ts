import type { Comment } from '../database/entities';

export type CommentDto = {
  id: number;
  text: string;
  createdAt: string;
  postId: number;
  author: { id: number; username: string } | null;
};

export function toCommentDto(comment: Comment): CommentDto {
  return {
    id: comment.id,
    text: comment.text,
    createdAt: comment.createdAt.toISOString(),
    postId: comment.postId,
    author: comment.author ? { id: comment.author.id, username: comment.author.username } : null,
  };
}
