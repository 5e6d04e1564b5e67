import { Module } from '@nestjs/common';
import { EnrollmentModule } from './enrollment/enrollment.module';
import { ProgressModule } from './progress/progress.module';

@Module({
    imports: [
        EnrollmentModule,
        ProgressModule,
    ],
})
export class StudentModule { }
