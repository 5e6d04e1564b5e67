import { Module } from '@nestjs/common';
import { CourseLessonsController } from './course-lessons.controller';
import { CourseLessonsService } from './course-lessons.service';
import { CourseCatalogModule } from '../course-catalog.module';
import { EnrollmentModule } from '../../student/enrollment/enrollment.module';

@Module({
  imports: [CourseCatalogModule, EnrollmentModule],
  controllers: [CourseLessonsController],
  providers: [CourseLessonsService],
})
export class CourseLessonsModule { }
