import { Controller, Get, HttpCode, HttpStatus, Param, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { EnrollmentService } from './enrollment.service';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../../../common/guard/role/roles.guard';
import { Roles } from '../../../common/guard/role/roles.decorator';
import { Role } from '../../../common/guard/role/role.enum';
import { CurrentPrincipal } from '../../../common/decorator/current-principal.decorator';
import { Principal } from '../../../common/interfaces/principal.interface';

@ApiTags('student-enrollment')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles(Role.STUDENT)
@Controller('student')
export class EnrollmentController {
  constructor(private readonly enrollmentService: EnrollmentService) { }

  @Post('courses/:course/enroll')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Enroll in a published course (id or slug)' })
  async enroll(
    @CurrentPrincipal() principal: Principal,
    @Param('course') course: string,
  ) {
    return this.enrollmentService.enroll(principal, course);
  }

  @Get('courses/:course/enrollment-status')
  @Roles(Role.STUDENT, Role.TEACHER)
  @ApiOperation({ summary: 'Check whether the caller is enrolled in a course' })
  async getStatus(
    @CurrentPrincipal() principal: Principal,
    @Param('course') course: string,
  ) {
    return this.enrollmentService.getStatus(principal, course);
  }

  @Get('enrollments')
  @ApiOperation({ summary: 'List the caller\'s enrollments with progress' })
  async listEnrollments(@CurrentPrincipal() principal: Principal) {
    return this.enrollmentService.listForStudent(principal);
  }
}
