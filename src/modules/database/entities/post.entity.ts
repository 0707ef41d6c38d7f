import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { Category } from './category.entity';
import type { Comment } from './comment.entity';
import { User } from './user.entity';

@Entity('posts')
@Index(['pubDate', 'title'])
export class Post {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 256 })
  title!: string;

  @Column({ type: 'text' })
  text!: string;

  /** Posts dated in the future stay hidden from public feeds until then. */
  @Column({ type: 'timestamptz' })
  pubDate!: Date;

  @Column({ type: 'boolean', default: true })
  isPublished!: boolean;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @Index()
  @Column({ type: 'int' })
  authorId!: number;

  @ManyToOne(() => User, (user) => user.posts, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'authorId' })
  author!: User;

  @Index()
  @Column({ type: 'int', nullable: true })
  categoryId!: number | null;

  @ManyToOne(() => Category, (category) => category.posts, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'categoryId' })
  category!: Category | null;

  @OneToMany('Comment', 'post')
  comments!: Comment[];

  /** Filled by feed queries (live count, never stored). */
  commentCount?: number;
}
