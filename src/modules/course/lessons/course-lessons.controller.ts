import { Controller, Get, Param, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CourseLessonsService } from './course-lessons.service';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../../../common/guard/role/roles.guard';
import { Roles } from '../../../common/guard/role/roles.decorator';
import { Role } from '../../../common/guard/role/role.enum';
import { CurrentPrincipal } from '../../../common/decorator/current-principal.decorator';
import { Principal } from '../../../common/interfaces/principal.interface';

@ApiTags('course-lessons')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles(Role.STUDENT, Role.TEACHER)
@Controller('courses')
export class CourseLessonsController {
  constructor(private readonly courseLessonsService: CourseLessonsService) { }

  @Get(':course/lessons')
  @ApiOperation({ summary: 'List the lessons of a course (owner or enrolled student)' })
  async listLessons(@CurrentPrincipal() principal: Principal, @Param('course') course: string) {
    return this.courseLessonsService.listLessons(principal, course);
  }
}
