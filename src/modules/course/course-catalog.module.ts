import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Course } from './entities/course.entity';
import { Lesson } from './entities/lesson.entity';
import { CourseCatalogService } from './course-catalog.service';

@Module({
  imports: [TypeOrmModule.forFeature([Course, Lesson])],
  providers: [CourseCatalogService],
  exports: [CourseCatalogService, TypeOrmModule],
})
export class CourseCatalogModule { }
