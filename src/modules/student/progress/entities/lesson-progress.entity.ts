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
import { Enrollment } from '../../enrollment/entities/enrollment.entity';
import { Lesson } from '../../../course/entities/lesson.entity';

/**
 * Completion fact for one lesson of one enrollment. Rows are only ever
 * inserted on the first completion, so `completed_at` is the insert time
 * and never changes afterwards.
 */
@Entity('lesson_progress')
@Unique('UQ_lesson_progress_enrollment_lesson', ['enrollment_id', 'lesson_id'])
export class LessonProgress {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'int' })
  enrollment_id!: number;

  @ManyToOne(() => Enrollment, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'enrollment_id' })
  enrollment?: Enrollment;

  @Column({ type: 'int' })
  lesson_id!: number;

  @ManyToOne(() => Lesson, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'lesson_id' })
  lesson?: Lesson;

  @Column({ type: 'boolean', default: true })
  completed!: boolean;

  @CreateDateColumn()
  completed_at!: Date;
}
