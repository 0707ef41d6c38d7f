import { Category } from './category.entity';
import { Comment } from './comment.entity';
import { Post } from './post.entity';
import { Session } from './session.entity';
import { User } from './user.entity';

export { Category, Comment, Post, Session, User };

export const BLOG_ENTITIES = [User, Category, Post, Comment, Session];
