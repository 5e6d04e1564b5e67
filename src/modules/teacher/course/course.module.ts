import { Module } from '@nestjs/common';
import { CourseService } from './course.service';
import { CourseController } from './course.controller';
import { CourseCatalogModule } from '../../course/course-catalog.module';
import { EnrollmentModule } from '../../student/enrollment/enrollment.module';

@Module({
  imports: [CourseCatalogModule, EnrollmentModule],
  controllers: [CourseController],
  providers: [CourseService],
})
export class TeacherCourseModule { }
