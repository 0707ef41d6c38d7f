import { isCategoryVisible, isPubliclyVisible } from './post-visibility';

const now = new Date('2024-06-01T12:00:00.000Z');

function post(overrides?: Partial<Parameters<typeof isPubliclyVisible>[0]>) {
  return {
    isPublished: true,
    pubDate: new Date('2024-05-01T00:00:00.000Z'),
    category: { isPublished: true },
    ...overrides,
  };
}

describe('post visibility', () => {
  it('shows published, past-dated posts in a published category', () => {
    expect(isPubliclyVisible(post(), now)).toBe(true);
  });

  it('hides unpublished posts', () => {
    expect(isPubliclyVisible(post({ isPublished: false }), now)).toBe(false);
  });

  it('hides posts scheduled for later', () => {
    expect(isPubliclyVisible(post({ pubDate: new Date('2024-06-01T12:00:01.000Z') }), now)).toBe(false);
  });

  it('treats pubDate equal to now as published', () => {
    expect(isPubliclyVisible(post({ pubDate: now }), now)).toBe(true);
  });

  it('hides posts filed under an unpublished category', () => {
    expect(isPubliclyVisible(post({ category: { isPublished: false } }), now)).toBe(false);
  });

  it('shows uncategorized posts', () => {
    expect(isPubliclyVisible(post({ category: null }), now)).toBe(true);
  });

  it('category visibility follows its published flag', () => {
    expect(isCategoryVisible({ isPublished: true })).toBe(true);
    expect(isCategoryVisible({ isPublished: false })).toBe(false);
  });
});
