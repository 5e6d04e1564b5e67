import { Global, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { AllEntities, Course, Lesson } from '../../src/database/entities';
import { TransientRetryService } from '../../src/database/transient-retry.service';

/**
 * Stand-in for DatabaseModule: the same entities on an in-memory SQLite
 * database, rebuilt for every testing module.
 */
@Global()
@Module({
  imports: [
    TypeOrmModule.forRoot({
      type: 'better-sqlite3',
      database: ':memory:',
      entities: AllEntities,
      synchronize: true,
      dropSchema: true,
      logging: false,
    }),
  ],
  providers: [TransientRetryService],
  exports: [TransientRetryService],
})
export class TestingDatabaseModule { }

export interface SeedCourseOptions {
  teacherId?: number;
  slug?: string;
  title?: string;
  published?: boolean;
  lessons?: number;
}

export interface SeededCourse {
  course: Course;
  lessons: Lesson[];
}

/** Inserts a course with `lessons` lessons at positions 1..n. */
export async function seedCourse(dataSource: DataSource, options: SeedCourseOptions = {}): Promise<SeededCourse> {
  const slug = options.slug ?? 'intro-to-algebra';
  const courseRepo = dataSource.getRepository(Course);
  const lessonRepo = dataSource.getRepository(Lesson);

  const course = await courseRepo.save(
    courseRepo.create({
      teacher_id: options.teacherId ?? 100,
      slug,
      title: options.title ?? slug,
      description: '',
      is_published: options.published ?? true,
    }),
  );

  const lessons: Lesson[] = [];
  for (let position = 1; position <= (options.lessons ?? 0); position++) {
    lessons.push(
      await lessonRepo.save(
        lessonRepo.create({ course_id: course.id, title: `Lesson ${position}`, position }),
      ),
    );
  }

  return { course, lessons };
}
