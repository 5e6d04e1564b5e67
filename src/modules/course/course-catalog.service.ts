import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Course } from './entities/course.entity';
import { Lesson } from './entities/lesson.entity';
import { TransientRetryService } from '../../database/transient-retry.service';
import { isDbId } from '../../common/helper/id.helper';

/** Course reference as it appears in a route: numeric id or slug. */
export type CourseRef = string | number;

const NUMERIC_ID = /^\d+$/;

/**
 * Read access to courses and their lessons.
 */
@Injectable()
export class CourseCatalogService {
  constructor(
    @InjectRepository(Course) private readonly courseRepo: Repository<Course>,
    @InjectRepository(Lesson) private readonly lessonRepo: Repository<Lesson>,
    private readonly retry: TransientRetryService,
  ) { }

  async getCourse(ref: CourseRef): Promise<Course | null> {
    const key = String(ref).trim();
    if (!key) {
      return null;
    }
    if (!NUMERIC_ID.test(key)) {
      return this.retry.run('getCourse', () => this.courseRepo.findOne({ where: { slug: key } }));
    }

    // slugs always contain a letter, so a digit-only key is an id
    const id = parseInt(key, 10);
    if (!isDbId(id)) {
      return null;
    }
    return this.retry.run('getCourse', () => this.courseRepo.findOne({ where: { id } }));
  }

  async listLessons(courseId: number): Promise<Lesson[]> {
    return this.retry.run('listLessons', () =>
      this.lessonRepo.find({
        where: { course_id: courseId },
        order: { position: 'ASC' },
      }),
    );
  }

  async countLessons(courseId: number): Promise<number> {
    return this.retry.run('countLessons', () =>
      this.lessonRepo.count({ where: { course_id: courseId } }),
    );
  }

  /** The lesson only if it exists and belongs to the given course. */
  async findLessonInCourse(courseId: number, lessonId: number): Promise<Lesson | null> {
    if (!isDbId(lessonId)) {
      return null;
    }
    return this.retry.run('findLessonInCourse', () =>
      this.lessonRepo.findOne({ where: { id: lessonId, course_id: courseId } }),
    );
  }
}
