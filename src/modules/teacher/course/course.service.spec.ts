import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { CourseService } from './course.service';
import { TeacherCourseModule } from './course.module';
import { Course } from '../../course/entities/course.entity';
import { EnrollmentService } from '../../student/enrollment/enrollment.service';
import { Role } from '../../../common/guard/role/role.enum';
import {
  CourseNotFoundException,
  CourseOwnershipException,
  DuplicateResourceException,
  RoleForbiddenException,
  UnusableSlugException,
} from '../../../common/exception/learning.exceptions';
import { TestingDatabaseModule, seedCourse } from '../../../../test/helpers/testing-database';

describe('CourseService (teacher)', () => {
  let module: TestingModule;
  let service: CourseService;
  let enrollmentService: EnrollmentService;
  let dataSource: DataSource;

  const owner = { id: 100, role: Role.TEACHER };
  const otherTeacher = { id: 101, role: Role.TEACHER };
  const student = { id: 1, role: Role.STUDENT };

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [TestingDatabaseModule, TeacherCourseModule],
    }).compile();

    service = module.get<CourseService>(CourseService);
    enrollmentService = module.get<EnrollmentService>(EnrollmentService);
    dataSource = module.get<DataSource>(DataSource);
  });

  afterEach(async () => {
    await module.close();
  });

  describe('create', () => {
    it('creates an unpublished course owned by the caller with a slug from the title', async () => {
      const result = await service.create(owner, { title: 'Intro to Algebra' });

      expect(result.data).toMatchObject({
        teacher_id: 100,
        title: 'Intro to Algebra',
        slug: 'intro-to-algebra',
        is_published: false,
      });
    });

    it('rejects a duplicate slug', async () => {
      await service.create(owner, { title: 'Intro to Algebra' });

      await expect(service.create(otherTeacher, { title: 'Algebra', slug: 'intro-to-algebra' }))
        .rejects.toBeInstanceOf(DuplicateResourceException);
    });

    it('prefixes a digit-only title slug so it stays reachable by slug', async () => {
      const result = await service.create(owner, { title: '2024' });
      expect(result.data?.slug).toBe('course-2024');

      const published = await service.setPublished(owner, 'course-2024', true);
      expect(published.data).toMatchObject({ id: result.data?.id, is_published: true });
    });

    it('refuses a title that yields no slug unless one is given', async () => {
      await expect(service.create(owner, { title: '数学入门' })).rejects.toBeInstanceOf(UnusableSlugException);
      await expect(service.create(owner, { title: '!!!' })).rejects.toBeInstanceOf(UnusableSlugException);
      await expect(dataSource.getRepository(Course).count()).resolves.toBe(0);

      const result = await service.create(owner, { title: '数学入门', slug: 'intro-to-mathematics' });
      expect(result.data?.slug).toBe('intro-to-mathematics');
    });

    it('is limited to teachers', async () => {
      await expect(service.create(student, { title: 'Algebra' })).rejects.toBeInstanceOf(RoleForbiddenException);
    });
  });

  describe('setPublished', () => {
    it('lets the owner publish the course', async () => {
      await seedCourse(dataSource, { teacherId: owner.id, published: false });

      const result = await service.setPublished(owner, 'intro-to-algebra', true);

      expect(result.message).toBe('Course published');
      const stored = await dataSource.getRepository(Course).findOneBy({ slug: 'intro-to-algebra' });
      expect(stored?.is_published).toBe(true);
    });

    it('refuses another teacher', async () => {
      await seedCourse(dataSource, { teacherId: owner.id, published: false });

      await expect(service.setPublished(otherTeacher, 'intro-to-algebra', true))
        .rejects.toBeInstanceOf(CourseOwnershipException);
    });

    it('reports a missing course as NotFound', async () => {
      await expect(service.setPublished(owner, 'missing-course', true)).rejects.toBeInstanceOf(CourseNotFoundException);
    });
  });

  describe('addLesson', () => {
    it('adds a lesson to an owned course', async () => {
      const { course } = await seedCourse(dataSource, { teacherId: owner.id, lessons: 1 });

      const result = await service.addLesson(owner, String(course.id), { title: 'Loops', position: 2 });

      expect(result.data).toMatchObject({ course_id: course.id, title: 'Loops', position: 2 });
    });

    it('rejects a position already used in the course', async () => {
      await seedCourse(dataSource, { teacherId: owner.id, lessons: 1 });

      await expect(service.addLesson(owner, 'intro-to-algebra', { title: 'Again', position: 1 }))
        .rejects.toBeInstanceOf(DuplicateResourceException);
    });

    it('refuses a student even when their id matches the owner id', async () => {
      await seedCourse(dataSource, { teacherId: owner.id });

      await expect(service.addLesson({ id: owner.id, role: Role.STUDENT }, 'intro-to-algebra', { title: 'x', position: 1 }))
        .rejects.toBeInstanceOf(CourseOwnershipException);
    });
  });

  describe('listEnrollments', () => {
    it('lists enrollments of an owned course with progress', async () => {
      await seedCourse(dataSource, { teacherId: owner.id, lessons: 4 });
      await enrollmentService.enroll(student, 'intro-to-algebra');

      const result = await service.listEnrollments(owner, 'intro-to-algebra');

      expect(result.data).toHaveLength(1);
      expect(result.data?.[0]).toMatchObject({ student_id: 1, progress_percentage: 0, completed: false });
    });

    it('refuses another teacher', async () => {
      await seedCourse(dataSource, { teacherId: owner.id });

      await expect(service.listEnrollments(otherTeacher, 'intro-to-algebra'))
        .rejects.toBeInstanceOf(CourseOwnershipException);
    });
  });
});
