import { Course } from '../modules/course/entities/course.entity';
import { Lesson } from '../modules/course/entities/lesson.entity';
import { Enrollment } from '../modules/student/enrollment/entities/enrollment.entity';
import { LessonProgress } from '../modules/student/progress/entities/lesson-progress.entity';

export { Course, Lesson, Enrollment, LessonProgress };

/** Every entity, in the order TypeORM should register them. */
export const AllEntities = [Course, Lesson, Enrollment, LessonProgress];
