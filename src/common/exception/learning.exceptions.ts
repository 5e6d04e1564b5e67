import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
} from '@nestjs/common';
import { Role } from '../guard/role/role.enum';
import { ERROR_KIND } from './error-kind';

export const ERROR_MESSAGES = {
  ONLY_STUDENTS: 'Only students can perform this action.',
  ONLY_TEACHERS: 'Only teachers can perform this action.',
  NOT_COURSE_OWNER: 'You can only modify your own courses.',
  NOT_ENROLLMENT_OWNER: 'You do not have permission to access this enrollment.',
  COURSE_NOT_FOUND: 'Course not found',
  ENROLLMENT_NOT_FOUND: 'Enrollment not found',
  ALREADY_ENROLLED: 'You are already enrolled in this course',
  INVALID_LESSON: 'Lesson not found in this course',
  DUPLICATE_COURSE_SLUG: 'A course with this slug already exists',
  UNUSABLE_TITLE_SLUG: 'The title does not produce a usable slug; provide one explicitly',
  NOT_ENROLLED: 'You must be enrolled in this course to view its lessons.',
  DUPLICATE_LESSON_ORDER: 'A lesson with this order already exists in the course',
} as const;

function roleMessage(roles: Role[]): string {
  if (roles.length === 1 && roles[0] === Role.STUDENT) {
    return ERROR_MESSAGES.ONLY_STUDENTS;
  }
  if (roles.length === 1 && roles[0] === Role.TEACHER) {
    return ERROR_MESSAGES.ONLY_TEACHERS;
  }
  return 'You are not allowed to perform this action.';
}

export class RoleForbiddenException extends ForbiddenException {
  constructor(roles: Role[]) {
    super({ message: roleMessage(roles), error: ERROR_KIND.FORBIDDEN });
  }
}

export class CourseOwnershipException extends ForbiddenException {
  constructor() {
    super({ message: ERROR_MESSAGES.NOT_COURSE_OWNER, error: ERROR_KIND.FORBIDDEN });
  }
}

export class EnrollmentOwnershipException extends ForbiddenException {
  constructor() {
    super({ message: ERROR_MESSAGES.NOT_ENROLLMENT_OWNER, error: ERROR_KIND.FORBIDDEN });
  }
}

export class CourseNotFoundException extends NotFoundException {
  constructor() {
    super({ message: ERROR_MESSAGES.COURSE_NOT_FOUND, error: ERROR_KIND.NOT_FOUND });
  }
}

export class EnrollmentNotFoundException extends NotFoundException {
  constructor() {
    super({ message: ERROR_MESSAGES.ENROLLMENT_NOT_FOUND, error: ERROR_KIND.NOT_FOUND });
  }
}

export class AlreadyEnrolledException extends BadRequestException {
  constructor() {
    super({ message: ERROR_MESSAGES.ALREADY_ENROLLED, error: ERROR_KIND.ALREADY_ENROLLED });
  }
}

export class InvalidLessonException extends BadRequestException {
  constructor() {
    super({ message: ERROR_MESSAGES.INVALID_LESSON, error: ERROR_KIND.INVALID_LESSON });
  }
}

export class DuplicateResourceException extends ConflictException {
  constructor(message: string) {
    super({ message, error: ERROR_KIND.CONFLICT });
  }
}

export class UnusableSlugException extends BadRequestException {
  constructor() {
    super({ message: ERROR_MESSAGES.UNUSABLE_TITLE_SLUG, error: ERROR_KIND.VALIDATION_FAILED });
  }
}

export class LessonAccessException extends ForbiddenException {
  constructor() {
    super({ message: ERROR_MESSAGES.NOT_ENROLLED, error: ERROR_KIND.FORBIDDEN });
  }
}
