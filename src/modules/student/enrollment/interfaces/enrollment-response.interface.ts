export interface CourseSummary {
  id: number;
  slug: string;
  title: string;
}

export interface EnrollmentView {
  id: number;
  student_id: number;
  course_id: number;
  enrolled_at: Date;
  progress_percentage: number;
  completed: boolean;
  course?: CourseSummary;
}

export interface EnrollmentStatus {
  enrolled: boolean;
  enrollment_id?: number;
}

export interface EnrollmentStatistics {
  total_enrollments: number;
  completed_enrollments: number;
  average_progress: number;
}

export interface StudentEnrollments {
  enrollments: EnrollmentView[];
  statistics: EnrollmentStatistics;
}
