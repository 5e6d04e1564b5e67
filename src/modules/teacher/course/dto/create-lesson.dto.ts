import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsString, MaxLength, Min } from 'class-validator';

export class CreateLessonDto {
  @ApiProperty({ example: 'Variables and types' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  title!: string;

  @ApiProperty({ example: 1, description: 'Position of the lesson in the course, unique per course' })
  @Type(() => Number)
  @IsInt()
  @Min(0)
  position!: number;
}
