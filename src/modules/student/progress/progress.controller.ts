import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  UseGuards,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { LessonProgressService } from './services/lesson-progress.service';
import { CompleteLessonDto } from './dto/complete-lesson.dto';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../../../common/guard/role/roles.guard';
import { Roles } from '../../../common/guard/role/roles.decorator';
import { Role } from '../../../common/guard/role/role.enum';
import { CurrentPrincipal } from '../../../common/decorator/current-principal.decorator';
import { Principal } from '../../../common/interfaces/principal.interface';

@ApiTags('student-progress')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles(Role.STUDENT)
@Controller('student/enrollments/:enrollmentId')
@UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
export class ProgressController {
  constructor(private readonly lessonProgressService: LessonProgressService) { }

  @Get('progress')
  @ApiOperation({ summary: 'Get progress of an enrollment' })
  async getProgress(
    @CurrentPrincipal() principal: Principal,
    @Param('enrollmentId', ParseIntPipe) enrollmentId: number,
  ) {
    return this.lessonProgressService.getEnrollmentProgress(principal, enrollmentId);
  }

  @Post('complete-lesson')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Mark a lesson of the enrolled course as complete' })
  async completeLesson(
    @CurrentPrincipal() principal: Principal,
    @Param('enrollmentId', ParseIntPipe) enrollmentId: number,
    @Body() body: CompleteLessonDto,
  ) {
    return this.lessonProgressService.completeLesson(principal, enrollmentId, body.lesson_id);
  }
}
