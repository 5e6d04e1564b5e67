import { ApiProperty } from '@nestjs/swagger';
import { IsBoolean } from 'class-validator';

export class PublishCourseDto {
  @ApiProperty({ example: true })
  @IsBoolean()
  is_published!: boolean;
}
