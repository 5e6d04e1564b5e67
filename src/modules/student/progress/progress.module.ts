import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LessonProgress } from './entities/lesson-progress.entity';
import { LessonProgressService } from './services/lesson-progress.service';
import { ProgressController } from './progress.controller';
import { ProgressServicesModule } from './progress-services.module';
import { EnrollmentModule } from '../enrollment/enrollment.module';
import { CourseCatalogModule } from '../../course/course-catalog.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([LessonProgress]),
    CourseCatalogModule,
    ProgressServicesModule,
    EnrollmentModule,
  ],
  controllers: [ProgressController],
  providers: [LessonProgressService],
})
export class ProgressModule { }
