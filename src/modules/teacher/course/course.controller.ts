import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  UseGuards,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CourseService } from './course.service';
import { CreateCourseDto } from './dto/create-course.dto';
import { PublishCourseDto } from './dto/publish-course.dto';
import { CreateLessonDto } from './dto/create-lesson.dto';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../../../common/guard/role/roles.guard';
import { Roles } from '../../../common/guard/role/roles.decorator';
import { Role } from '../../../common/guard/role/role.enum';
import { CurrentPrincipal } from '../../../common/decorator/current-principal.decorator';
import { Principal } from '../../../common/interfaces/principal.interface';

@ApiTags('teacher-course')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles(Role.TEACHER)
@Controller('teacher/courses')
@UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
export class CourseController {
  constructor(private readonly courseService: CourseService) { }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a draft course' })
  async create(@CurrentPrincipal() principal: Principal, @Body() body: CreateCourseDto) {
    return this.courseService.create(principal, body);
  }

  @Patch(':course/publish')
  @ApiOperation({ summary: 'Publish or unpublish an owned course' })
  async setPublished(
    @CurrentPrincipal() principal: Principal,
    @Param('course') course: string,
    @Body() body: PublishCourseDto,
  ) {
    return this.courseService.setPublished(principal, course, body.is_published);
  }

  @Post(':course/lessons')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Add a lesson to an owned course' })
  async addLesson(
    @CurrentPrincipal() principal: Principal,
    @Param('course') course: string,
    @Body() body: CreateLessonDto,
  ) {
    return this.courseService.addLesson(principal, course, body);
  }

  @Get(':course/enrollments')
  @ApiOperation({ summary: 'List enrollments of an owned course with progress' })
  async listEnrollments(@CurrentPrincipal() principal: Principal, @Param('course') course: string) {
    return this.courseService.listEnrollments(principal, course);
  }
}
