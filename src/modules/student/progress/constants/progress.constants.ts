export const SUCCESS_MESSAGES = {
  ENROLLED: 'Enrolled successfully',
  ENROLLMENT_STATUS: 'Enrollment status retrieved successfully',
  ENROLLMENTS_RETRIEVED: 'Student enrollments retrieved successfully',
  NO_ENROLLMENTS: 'No enrollments found for this student',
  LESSON_COMPLETED: 'Lesson marked as complete',
  LESSON_ALREADY_COMPLETED: 'Lesson already completed',
  PROGRESS_RETRIEVED: 'Enrollment progress retrieved successfully',
} as const;

export const FULL_PROGRESS = 100;
