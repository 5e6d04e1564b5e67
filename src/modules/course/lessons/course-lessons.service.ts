import { Injectable, Logger } from '@nestjs/common';
import { Lesson } from '../entities/lesson.entity';
import { CourseCatalogService, CourseRef } from '../course-catalog.service';
import { EnrollmentService } from '../../student/enrollment/enrollment.service';
import { ApiResponse } from '../../../common/interfaces/api-response.interface';
import { Principal } from '../../../common/interfaces/principal.interface';
import { canManageCourse, canViewLessons } from '../../../common/guard/policy/access.policy';
import { CourseNotFoundException, LessonAccessException } from '../../../common/exception/learning.exceptions';

@Injectable()
export class CourseLessonsService {
  private readonly logger = new Logger(CourseLessonsService.name);

  constructor(
    private readonly catalog: CourseCatalogService,
    private readonly enrollmentService: EnrollmentService,
  ) { }

  /**
   * Lessons of a course in position order, for its teacher and its
   * enrolled students. Drafts are hidden from everyone but the owner.
   */
  async listLessons(principal: Principal, ref: CourseRef): Promise<ApiResponse<Lesson[]>> {
    const course = await this.catalog.getCourse(ref);
    const owner = course !== null && canManageCourse(principal, course);
    if (!course || (!course.is_published && !owner)) {
      throw new CourseNotFoundException();
    }

    const enrollment = owner ? null : await this.enrollmentService.findByStudentAndCourse(principal.id, course.id);
    if (!canViewLessons(principal, course, enrollment !== null)) {
      this.logger.warn(`User ${principal.id} (${principal.role}) denied lessons of course ${course.id}`);
      throw new LessonAccessException();
    }

    const lessons = await this.catalog.listLessons(course.id);
    return {
      success: true,
      message: 'Lessons retrieved successfully',
      data: lessons,
    };
  }
}
