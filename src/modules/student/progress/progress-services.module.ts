import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LessonProgress } from './entities/lesson-progress.entity';
import { CourseProgressService } from './services/course-progress.service';
import { CourseCatalogModule } from '../../course/course-catalog.module';

@Module({
  imports: [TypeOrmModule.forFeature([LessonProgress]), CourseCatalogModule],
  providers: [CourseProgressService],
  exports: [CourseProgressService],
})
export class ProgressServicesModule { }
