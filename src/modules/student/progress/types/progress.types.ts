import { LessonProgress } from '../entities/lesson-progress.entity';

export type EnrollmentRef = { id: number; course_id: number };

export interface ProgressSnapshot {
  total_lessons: number;
  completed_lessons: number;
  percentage: number;
}

export interface EnrollmentProgressView {
  enrollment_id: number;
  course_id: number;
  percentage: number;
  completed: boolean;
  total_lessons: number;
  completed_lesson_ids: number[];
  records: LessonProgress[];
}

export interface LessonCompletionResult {
  progress: LessonProgress;
  enrollment_progress_percentage: number;
  already_completed: boolean;
}
