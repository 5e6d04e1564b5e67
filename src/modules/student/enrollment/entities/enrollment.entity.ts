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
import { Course } from '../../../course/entities/course.entity';

/**
 * A student's enrollment in a course. The progress percentage is never
 * stored here; it is derived from lesson_progress on every read.
 */
@Entity('enrollments')
@Unique('UQ_enrollment_student_course', ['student_id', 'course_id'])
export class Enrollment {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'int' })
  student_id!: number;

  @Index()
  @Column({ type: 'int' })
  course_id!: number;

  @ManyToOne(() => Course, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'course_id' })
  course?: Course;

  @CreateDateColumn()
  enrolled_at!: Date;
}
