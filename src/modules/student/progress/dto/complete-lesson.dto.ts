import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, Min } from 'class-validator';

export class CompleteLessonDto {
  @ApiProperty({ example: 1 })
  @IsNotEmpty({ message: 'lesson_id is required' })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  lesson_id!: number;
}
