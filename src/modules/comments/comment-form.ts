import { commentCreatePath } from '../../common/paths';

export const COMMENT_TEXT_MAX_LENGTH = 5000;

export type FormFieldDescriptor = {
  name: string;
  label: string;
  widget: 'text' | 'textarea';
  required: boolean;
  maxLength: number | null;
  initial: string;
};

/** Enough for a client to render the (empty) "add comment" form under a post. */
export type CommentFormDescriptor = {
  action: string;
  method: 'POST';
  fields: FormFieldDescriptor[];
};

export function emptyCommentForm(postId: number): CommentFormDescriptor {
  return {
    action: commentCreatePath(postId),
    method: 'POST',
    fields: [
      {
        name: 'text',
        label: 'Comment',
        widget: 'textarea',
        required: true,
        maxLength: COMMENT_TEXT_MAX_LENGTH,
        initial: '',
      },
    ],
  };
}
