import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { LessonProgress } from '../entities/lesson-progress.entity';
import { CourseCatalogService } from '../../../course/course-catalog.service';
import { TransientRetryService } from '../../../../database/transient-retry.service';
import { FULL_PROGRESS } from '../constants/progress.constants';
import { EnrollmentRef, ProgressSnapshot } from '../types/progress.types';

/**
 * Whole-number completion percentage, truncated so that 100 is only
 * reported once every lesson is complete. An empty course is at 0.
 */
export function calculateProgressPercentage(completedLessons: number, totalLessons: number): number {
  if (totalLessons <= 0 || completedLessons <= 0) {
    return 0;
  }
  return Math.min(FULL_PROGRESS, Math.floor((FULL_PROGRESS * completedLessons) / totalLessons));
}

/**
 * Derives enrollment progress from lesson_progress rows. Nothing is cached:
 * lessons can be added to or removed from a course at any time, so both
 * counts are read fresh on every call.
 */
@Injectable()
export class CourseProgressService {
  constructor(
    @InjectRepository(LessonProgress) private readonly progressRepo: Repository<LessonProgress>,
    private readonly catalog: CourseCatalogService,
    private readonly retry: TransientRetryService,
  ) { }

  async computeProgress(enrollment: EnrollmentRef): Promise<number> {
    const snapshot = await this.getSnapshot(enrollment);
    return snapshot.percentage;
  }

  async getSnapshot(enrollment: EnrollmentRef): Promise<ProgressSnapshot> {
    const totalLessons = await this.catalog.countLessons(enrollment.course_id);
    const completedLessons = totalLessons === 0 ? 0 : await this.countCompletedLessons(enrollment);

    return {
      total_lessons: totalLessons,
      completed_lessons: completedLessons,
      percentage: calculateProgressPercentage(completedLessons, totalLessons),
    };
  }

  /**
   * Completion rows of the enrollment, in lesson order. Rows are only
   * written on completion, and the join drops any whose lesson has left
   * the course.
   */
  async getCompletedRecords(enrollment: EnrollmentRef): Promise<LessonProgress[]> {
    return this.retry.run('getCompletedRecords', () =>
      this.completedQuery(enrollment)
        .orderBy('lesson.position', 'ASC')
        .getMany(),
    );
  }

  private async countCompletedLessons(enrollment: EnrollmentRef): Promise<number> {
    return this.retry.run('countCompletedLessons', () =>
      this.completedQuery(enrollment).getCount(),
    );
  }

  private completedQuery(enrollment: EnrollmentRef) {
    return this.progressRepo
      .createQueryBuilder('progress')
      .innerJoin('progress.lesson', 'lesson')
      .where('progress.enrollment_id = :enrollmentId', { enrollmentId: enrollment.id })
      .andWhere('lesson.course_id = :courseId', { courseId: enrollment.course_id });
  }
}
