import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { Course } from './course.entity';

@Entity('lessons')
@Unique(['course_id', 'position'])
export class Lesson {
  @PrimaryGeneratedColumn()
  id!: number;

  @CreateDateColumn()
  created_at!: Date;

  @Index()
  @Column({ type: 'int' })
  course_id!: number;

  @ManyToOne(() => Course, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'course_id' })
  course?: Course;

  @Column({ type: 'varchar', length: 200 })
  title!: string;

  /** Order of the lesson within its course. */
  @Column({ type: 'int' })
  position!: number;
}
