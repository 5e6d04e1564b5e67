import { Module } from '@nestjs/common';
import { TeacherCourseModule } from './course/course.module';

@Module({
  imports: [
    TeacherCourseModule,
  ],
})
export class TeacherModule { }
