import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import slugify from 'slugify';
import { CreateCourseDto } from './dto/create-course.dto';
import { CreateLessonDto } from './dto/create-lesson.dto';
import { Course } from '../../course/entities/course.entity';
import { Lesson } from '../../course/entities/lesson.entity';
import { CourseCatalogService, CourseRef } from '../../course/course-catalog.service';
import { EnrollmentService } from '../../student/enrollment/enrollment.service';
import { EnrollmentView } from '../../student/enrollment/interfaces/enrollment-response.interface';
import { ApiResponse } from '../../../common/interfaces/api-response.interface';
import { Principal } from '../../../common/interfaces/principal.interface';
import { Role } from '../../../common/guard/role/role.enum';
import { canManageCourse } from '../../../common/guard/policy/access.policy';
import { isUniqueViolation } from '../../../common/helper/db-error.helper';
import {
  CourseNotFoundException,
  CourseOwnershipException,
  DuplicateResourceException,
  ERROR_MESSAGES,
  RoleForbiddenException,
  UnusableSlugException,
} from '../../../common/exception/learning.exceptions';

const DIGITS_ONLY = /^\d+$/;

/**
 * Slug derived from a course title. Digit-only keys address courses by id,
 * so a digit-only slug gets a prefix.
 */
export function slugFromTitle(title: string): string | null {
  const slug = slugify(title, { lower: true, strict: true });
  if (!slug) {
    return null;
  }
  return DIGITS_ONLY.test(slug) ? `course-${slug}` : slug;
}

@Injectable()
export class CourseService {
  private readonly logger = new Logger(CourseService.name);

  constructor(
    @InjectRepository(Course) private readonly courseRepo: Repository<Course>,
    @InjectRepository(Lesson) private readonly lessonRepo: Repository<Lesson>,
    private readonly catalog: CourseCatalogService,
    private readonly enrollmentService: EnrollmentService,
  ) { }

  /**
   * Create a draft course owned by the calling teacher
   */
  async create(principal: Principal, dto: CreateCourseDto): Promise<ApiResponse<Course>> {
    if (principal.role !== Role.TEACHER) {
      throw new RoleForbiddenException([Role.TEACHER]);
    }

    const slug = dto.slug ?? slugFromTitle(dto.title);
    if (!slug) {
      throw new UnusableSlugException();
    }

    try {
      const course = await this.courseRepo.save(
        this.courseRepo.create({
          teacher_id: principal.id,
          title: dto.title,
          slug,
          description: dto.description ?? '',
          is_published: false,
        }),
      );
      this.logger.log(`Course ${course.id} "${course.slug}" created by teacher ${principal.id}`);
      return { success: true, message: 'Course created successfully', data: course };
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateResourceException(ERROR_MESSAGES.DUPLICATE_COURSE_SLUG);
      }
      throw error;
    }
  }

  async setPublished(principal: Principal, ref: CourseRef, isPublished: boolean): Promise<ApiResponse<Course>> {
    const course = await this.getManagedCourse(principal, ref);

    course.is_published = isPublished;
    const saved = await this.courseRepo.save(course);
    this.logger.log(`Course ${course.id} ${isPublished ? 'published' : 'unpublished'} by teacher ${principal.id}`);

    return {
      success: true,
      message: isPublished ? 'Course published' : 'Course unpublished',
      data: saved,
    };
  }

  async addLesson(principal: Principal, ref: CourseRef, dto: CreateLessonDto): Promise<ApiResponse<Lesson>> {
    const course = await this.getManagedCourse(principal, ref);

    try {
      const lesson = await this.lessonRepo.save(
        this.lessonRepo.create({
          course_id: course.id,
          title: dto.title,
          position: dto.position,
        }),
      );
      this.logger.log(`Lesson ${lesson.id} added to course ${course.id} at position ${lesson.position}`);
      return { success: true, message: 'Lesson created successfully', data: lesson };
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateResourceException(ERROR_MESSAGES.DUPLICATE_LESSON_ORDER);
      }
      throw error;
    }
  }

  async listEnrollments(principal: Principal, ref: CourseRef): Promise<ApiResponse<EnrollmentView[]>> {
    const course = await this.getManagedCourse(principal, ref);
    const enrollments = await this.enrollmentService.listForCourse(course.id);

    return {
      success: true,
      message: 'Course enrollments retrieved successfully',
      data: enrollments,
    };
  }

  private async getManagedCourse(principal: Principal, ref: CourseRef): Promise<Course> {
    const course = await this.catalog.getCourse(ref);
    if (!course) {
      throw new CourseNotFoundException();
    }
    if (!canManageCourse(principal, course)) {
      this.logger.warn(`User ${principal.id} (${principal.role}) denied management of course ${course.id}`);
      throw new CourseOwnershipException();
    }
    return course;
  }
}
