import { NotFoundException } from '@nestjs/common';
import { InMemoryBlogStore, inMemoryRepositories } from '../../../test/support/in-memory-blog';
import { CommentsService } from './comments.service';

function makeService() {
  const store = new InMemoryBlogStore();
  const repos = inMemoryRepositories(store);
  const svc = new CommentsService(repos.comments, repos.posts);
  const alice = store.addUser({ username: 'alice' });
  const bob = store.addUser({ username: 'bob' });
  const post = store.addPost({ author: alice, title: 'Hello', pubDate: new Date('2024-05-01T00:00:00.000Z') });
  return {
    svc,
    store,
    post,
    alice: { id: alice.id, username: 'alice' },
    bob: { id: bob.id, username: 'bob' },
  };
}

describe('CommentsService', () => {
  it('createComment attaches the comment to the post and the acting user', async () => {
    const { svc, store, post, bob } = makeService();

    const outcome = await svc.createComment({ actor: bob, postId: post.id, text: 'Nice post' });

    expect(outcome.kind).toBe('ok');
    expect(outcome.location).toBe(`/posts/${post.id}`);
    expect(store.comments).toHaveLength(1);
    expect(store.comments[0]).toMatchObject({ text: 'Nice post', postId: post.id, authorId: bob.id });
  });

  it('createComment on a missing post 404s and writes nothing', async () => {
    const { svc, store, bob } = makeService();

    await expect(svc.createComment({ actor: bob, postId: 999, text: 'hi' })).rejects.toThrow('Post not found.');
    expect(store.comments).toHaveLength(0);
  });

  it('updateComment by its author rewrites the text', async () => {
    const { svc, store, post, bob } = makeService();
    const comment = store.addComment({ post, author: store.users[1], text: 'typo' });

    const outcome = await svc.updateComment({ actor: bob, commentId: comment.id, text: 'fixed' });

    expect(outcome).toMatchObject({ kind: 'ok', location: `/posts/${post.id}` });
    expect(store.commentById(comment.id)?.text).toBe('fixed');
  });

  it("sends non-authors back to the parent post, not to the comment's id", async () => {
    const { svc, store, post, alice } = makeService();
    const bobUser = store.users[1];
    // Push the comment id away from the post id so the two can't be confused.
    store.nextId();
    store.nextId();
    const comment = store.addComment({ post, author: bobUser, text: 'mine' });

    const edit = await svc.prepareCommentEdit({ actor: alice, commentId: comment.id });
    const update = await svc.updateComment({ actor: alice, commentId: comment.id, text: 'hijacked' });
    const remove = await svc.deleteComment({ actor: alice, commentId: comment.id });

    expect(edit).toEqual({ kind: 'redirect', location: `/posts/${post.id}` });
    expect(update).toEqual({ kind: 'redirect', location: `/posts/${post.id}` });
    expect(remove).toEqual({ kind: 'redirect', location: `/posts/${post.id}` });
    expect(store.commentById(comment.id)?.text).toBe('mine');
  });

  it('deleteComment by its author removes it', async () => {
    const { svc, store, post, bob } = makeService();
    const comment = store.addComment({ post, author: store.users[1], text: 'bye' });

    const outcome = await svc.deleteComment({ actor: bob, commentId: comment.id });

    expect(outcome).toEqual({
      kind: 'ok',
      value: { id: comment.id, postId: post.id },
      location: `/posts/${post.id}`,
    });
    expect(store.comments).toHaveLength(0);
  });

  it('missing comments 404', async () => {
    const { svc, bob } = makeService();
    await expect(svc.prepareCommentEdit({ actor: bob, commentId: 77 })).rejects.toBeInstanceOf(NotFoundException);
    await expect(svc.updateComment({ actor: bob, commentId: 77, text: 'x' })).rejects.toBeInstanceOf(NotFoundException);
    await expect(svc.deleteComment({ actor: bob, commentId: 77 })).rejects.toBeInstanceOf(NotFoundException);
  });

  it('commentTarget resolves the post or 404s', async () => {
    const { svc, post } = makeService();
    await expect(svc.commentTarget(post.id)).resolves.toMatchObject({ id: post.id });
    await expect(svc.commentTarget(999)).rejects.toBeInstanceOf(NotFoundException);
  });
});
