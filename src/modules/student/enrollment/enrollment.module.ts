import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EnrollmentService } from './enrollment.service';
import { EnrollmentController } from './enrollment.controller';
import { Enrollment } from './entities/enrollment.entity';
import { CourseCatalogModule } from '../../course/course-catalog.module';
import { ProgressServicesModule } from '../progress/progress-services.module';

@Module({
  imports: [TypeOrmModule.forFeature([Enrollment]), CourseCatalogModule, ProgressServicesModule],
  controllers: [EnrollmentController],
  providers: [EnrollmentService],
  exports: [EnrollmentService],
})
export class EnrollmentModule { }
