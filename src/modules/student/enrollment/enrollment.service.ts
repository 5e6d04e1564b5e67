import { Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Enrollment } from './entities/enrollment.entity';
import {
  EnrollmentStatistics,
  EnrollmentStatus,
  EnrollmentView,
  StudentEnrollments,
} from './interfaces/enrollment-response.interface';
import { Course } from '../../course/entities/course.entity';
import { CourseCatalogService, CourseRef } from '../../course/course-catalog.service';
import { CourseProgressService } from '../progress/services/course-progress.service';
import { FULL_PROGRESS, SUCCESS_MESSAGES } from '../progress/constants/progress.constants';
import { TransientRetryService } from '../../../database/transient-retry.service';
import { ApiResponse } from '../../../common/interfaces/api-response.interface';
import { Principal } from '../../../common/interfaces/principal.interface';
import { Role } from '../../../common/guard/role/role.enum';
import { canEnroll } from '../../../common/guard/policy/access.policy';
import { isUniqueViolation } from '../../../common/helper/db-error.helper';
import { isDbId } from '../../../common/helper/id.helper';
import {
  AlreadyEnrolledException,
  CourseNotFoundException,
  RoleForbiddenException,
} from '../../../common/exception/learning.exceptions';

@Injectable()
export class EnrollmentService {
  private readonly logger = new Logger(EnrollmentService.name);

  constructor(
    @InjectRepository(Enrollment) private readonly enrollmentRepo: Repository<Enrollment>,
    private readonly catalog: CourseCatalogService,
    private readonly courseProgress: CourseProgressService,
    private readonly retry: TransientRetryService,
  ) { }

  /**
   * Enroll the calling student in a published course.
   *
   * The (student_id, course_id) unique constraint decides races: of several
   * concurrent calls for the same pair exactly one insert succeeds, the
   * others fail with a unique violation and get AlreadyEnrolled.
   */
  async enroll(principal: Principal, courseRef: CourseRef): Promise<ApiResponse<{ enrollment: EnrollmentView }>> {
    if (!canEnroll(principal)) {
      throw new RoleForbiddenException([Role.STUDENT]);
    }

    const course = await this.catalog.getCourse(courseRef);
    if (!course || !course.is_published) {
      throw new CourseNotFoundException();
    }

    try {
      await this.retry.run('enroll', () =>
        this.enrollmentRepo
          .createQueryBuilder()
          .insert()
          .into(Enrollment)
          .values({ student_id: principal.id, course_id: course.id })
          .updateEntity(false)
          .execute(),
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        this.logger.warn(`Student ${principal.id} is already enrolled in course ${course.id}`);
        throw new AlreadyEnrolledException();
      }
      throw error;
    }

    const enrollment = await this.findByStudentAndCourse(principal.id, course.id);
    if (!enrollment) {
      throw new InternalServerErrorException('Enrollment was not persisted');
    }

    this.logger.log(`Student ${principal.id} enrolled in course ${course.id} (enrollment ${enrollment.id})`);

    const percentage = await this.courseProgress.computeProgress(enrollment);

    return {
      success: true,
      message: SUCCESS_MESSAGES.ENROLLED,
      data: { enrollment: this.toView(enrollment, percentage, course) },
    };
  }

  /**
   * Whether the caller is enrolled in the course. Read-only; a teacher is
   * simply never enrolled.
   */
  async getStatus(principal: Principal, courseRef: CourseRef): Promise<ApiResponse<EnrollmentStatus>> {
    const course = await this.catalog.getCourse(courseRef);
    // drafts are only visible to teachers
    if (!course || (!course.is_published && principal.role !== Role.TEACHER)) {
      throw new CourseNotFoundException();
    }

    const enrollment = await this.findByStudentAndCourse(principal.id, course.id);

    return {
      success: true,
      message: SUCCESS_MESSAGES.ENROLLMENT_STATUS,
      data: enrollment ? { enrolled: true, enrollment_id: enrollment.id } : { enrolled: false },
    };
  }

  /**
   * The caller's enrollments, newest first (ties by id ascending), each with
   * a freshly computed progress percentage.
   */
  async listForStudent(principal: Principal): Promise<ApiResponse<StudentEnrollments>> {
    if (!canEnroll(principal)) {
      throw new RoleForbiddenException([Role.STUDENT]);
    }

    this.logger.log(`Fetching all enrollments for student: ${principal.id}`);

    const enrollments = await this.retry.run('listForStudent', () =>
      this.enrollmentRepo.find({
        where: { student_id: principal.id },
        relations: { course: true },
        order: { enrolled_at: 'DESC', id: 'ASC' },
      }),
    );

    const views = await this.withProgress(enrollments);

    return {
      success: true,
      message: views.length === 0 ? SUCCESS_MESSAGES.NO_ENROLLMENTS : SUCCESS_MESSAGES.ENROLLMENTS_RETRIEVED,
      data: {
        enrollments: views,
        statistics: this.statistics(views),
      },
    };
  }

  /**
   * Enrollments of one course in the same order as listForStudent. Callers
   * are expected to have checked course ownership.
   */
  async listForCourse(courseId: number): Promise<EnrollmentView[]> {
    const enrollments = await this.retry.run('listForCourse', () =>
      this.enrollmentRepo.find({
        where: { course_id: courseId },
        relations: { course: true },
        order: { enrolled_at: 'DESC', id: 'ASC' },
      }),
    );
    return this.withProgress(enrollments);
  }

  async findById(enrollmentId: number): Promise<Enrollment | null> {
    if (!isDbId(enrollmentId)) {
      return null;
    }
    return this.retry.run('findEnrollment', () =>
      this.enrollmentRepo.findOne({ where: { id: enrollmentId } }),
    );
  }

  async findByStudentAndCourse(studentId: number, courseId: number): Promise<Enrollment | null> {
    return this.retry.run('findEnrollment', () =>
      this.enrollmentRepo.findOne({ where: { student_id: studentId, course_id: courseId } }),
    );
  }

  private async withProgress(enrollments: Enrollment[]): Promise<EnrollmentView[]> {
    return Promise.all(
      enrollments.map(async (enrollment) => {
        const percentage = await this.courseProgress.computeProgress(enrollment);
        return this.toView(enrollment, percentage, enrollment.course);
      }),
    );
  }

  private statistics(views: EnrollmentView[]): EnrollmentStatistics {
    const total = views.length;
    const completed = views.filter((view) => view.completed).length;
    const average = total > 0
      ? Math.round((views.reduce((sum, view) => sum + view.progress_percentage, 0) / total) * 100) / 100
      : 0;

    return {
      total_enrollments: total,
      completed_enrollments: completed,
      average_progress: average,
    };
  }

  private toView(enrollment: Enrollment, percentage: number, course?: Course): EnrollmentView {
    return {
      id: enrollment.id,
      student_id: enrollment.student_id,
      course_id: enrollment.course_id,
      enrolled_at: enrollment.enrolled_at,
      progress_percentage: percentage,
      completed: percentage === FULL_PROGRESS,
      ...(course && { course: { id: course.id, slug: course.slug, title: course.title } }),
    };
  }
}
