import { Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { LessonProgress } from '../entities/lesson-progress.entity';
import { CourseProgressService, calculateProgressPercentage } from './course-progress.service';
import { FULL_PROGRESS, SUCCESS_MESSAGES } from '../constants/progress.constants';
import { EnrollmentProgressView, LessonCompletionResult } from '../types/progress.types';
import { Enrollment } from '../../enrollment/entities/enrollment.entity';
import { EnrollmentService } from '../../enrollment/enrollment.service';
import { CourseCatalogService } from '../../../course/course-catalog.service';
import { TransientRetryService } from '../../../../database/transient-retry.service';
import { ApiResponse } from '../../../../common/interfaces/api-response.interface';
import { Principal } from '../../../../common/interfaces/principal.interface';
import { canActOnEnrollment } from '../../../../common/guard/policy/access.policy';
import { isUniqueViolation } from '../../../../common/helper/db-error.helper';
import {
  EnrollmentNotFoundException,
  EnrollmentOwnershipException,
  InvalidLessonException,
} from '../../../../common/exception/learning.exceptions';

@Injectable()
export class LessonProgressService {
  private readonly logger = new Logger(LessonProgressService.name);

  constructor(
    @InjectRepository(LessonProgress) private readonly progressRepo: Repository<LessonProgress>,
    private readonly enrollmentService: EnrollmentService,
    private readonly catalog: CourseCatalogService,
    private readonly courseProgress: CourseProgressService,
    private readonly retry: TransientRetryService,
  ) { }

  /**
   * Mark a lesson of the enrollment's course as completed.
   *
   * The unique (enrollment, lesson) constraint decides which call records
   * the completion: exactly one insert succeeds, every other call sees the
   * violation and reads back the same row with its first completed_at.
   */
  async completeLesson(
    principal: Principal,
    enrollmentId: number,
    lessonId: number,
  ): Promise<ApiResponse<LessonCompletionResult>> {
    const enrollment = await this.getOwnedEnrollment(principal, enrollmentId);

    const lesson = await this.catalog.findLessonInCourse(enrollment.course_id, lessonId);
    if (!lesson) {
      this.logger.warn(`Lesson ${lessonId} is not part of course ${enrollment.course_id} (enrollment ${enrollment.id})`);
      throw new InvalidLessonException();
    }

    const existing = await this.findRecord(enrollment.id, lesson.id);
    const recorded = existing ? false : await this.recordCompletion(enrollment.id, lesson.id);

    const progress = existing ?? await this.findRecord(enrollment.id, lesson.id);
    if (!progress) {
      throw new InternalServerErrorException('Lesson progress was not persisted');
    }

    const percentage = await this.courseProgress.computeProgress(enrollment);

    if (recorded) {
      this.logger.log(`Lesson ${lesson.id} completed for enrollment ${enrollment.id}: ${percentage}%`);
      if (percentage === FULL_PROGRESS) {
        this.logger.log(`Enrollment ${enrollment.id} reached 100% of course ${enrollment.course_id}`);
      }
    } else {
      this.logger.log(`Lesson ${lesson.id} already completed for enrollment ${enrollment.id}`);
    }

    return {
      success: true,
      message: recorded ? SUCCESS_MESSAGES.LESSON_COMPLETED : SUCCESS_MESSAGES.LESSON_ALREADY_COMPLETED,
      data: {
        progress,
        enrollment_progress_percentage: percentage,
        already_completed: !recorded,
      },
    };
  }

  /**
   * Progress of one enrollment, recomputed against the course's current
   * lesson set.
   */
  async getEnrollmentProgress(
    principal: Principal,
    enrollmentId: number,
  ): Promise<ApiResponse<EnrollmentProgressView>> {
    const enrollment = await this.getOwnedEnrollment(principal, enrollmentId);

    const totalLessons = await this.catalog.countLessons(enrollment.course_id);
    const records = await this.courseProgress.getCompletedRecords(enrollment);
    const percentage = calculateProgressPercentage(records.length, totalLessons);

    return {
      success: true,
      message: SUCCESS_MESSAGES.PROGRESS_RETRIEVED,
      data: {
        enrollment_id: enrollment.id,
        course_id: enrollment.course_id,
        percentage,
        completed: percentage === FULL_PROGRESS,
        total_lessons: totalLessons,
        completed_lesson_ids: records.map((record) => record.lesson_id),
        records,
      },
    };
  }

  private async getOwnedEnrollment(principal: Principal, enrollmentId: number): Promise<Enrollment> {
    const enrollment = await this.enrollmentService.findById(enrollmentId);
    if (!enrollment) {
      throw new EnrollmentNotFoundException();
    }
    if (!canActOnEnrollment(principal, enrollment)) {
      this.logger.warn(`User ${principal.id} (${principal.role}) denied access to enrollment ${enrollment.id}`);
      throw new EnrollmentOwnershipException();
    }
    return enrollment;
  }

  /** True when this call inserted the row, false when it already existed. */
  private async recordCompletion(enrollmentId: number, lessonId: number): Promise<boolean> {
    try {
      await this.retry.run('completeLesson', () =>
        this.progressRepo
          .createQueryBuilder()
          .insert()
          .into(LessonProgress)
          .values({ enrollment_id: enrollmentId, lesson_id: lessonId, completed: true })
          .updateEntity(false)
          .execute(),
      );
      return true;
    } catch (error) {
      if (isUniqueViolation(error)) {
        return false;
      }
      throw error;
    }
  }

  private async findRecord(enrollmentId: number, lessonId: number): Promise<LessonProgress | null> {
    return this.retry.run('findLessonProgress', () =>
      this.progressRepo.findOne({ where: { enrollment_id: enrollmentId, lesson_id: lessonId } }),
    );
  }
}
