import { Role } from '../role/role.enum';
import { Principal } from '../../interfaces/principal.interface';

export type OwnedCourse = { teacher_id: number };
export type OwnedEnrollment = { student_id: number };

/**
 * Pure access predicates. Callers decide which error a `false` becomes;
 * nothing here touches the database or the request.
 */

/** Only the teacher who owns the course may change it or its lessons. */
export function canManageCourse(principal: Principal, course: OwnedCourse): boolean {
  return principal.role === Role.TEACHER && principal.id === course.teacher_id;
}

export function canEnroll(principal: Principal, _course?: OwnedCourse): boolean {
  return principal.role === Role.STUDENT;
}

/**
 * Ownership only. Course ownership grants nothing here, so the course's
 * teacher is refused like any other user.
 */
export function canActOnEnrollment(principal: Principal, enrollment: OwnedEnrollment): boolean {
  return principal.id === enrollment.student_id;
}

/** The owning teacher, or a student enrolled in the course. */
export function canViewLessons(principal: Principal, course: OwnedCourse, enrolled: boolean): boolean {
  return canManageCourse(principal, course) || (principal.role === Role.STUDENT && enrolled);
}
