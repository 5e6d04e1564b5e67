import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { EnrollmentService } from './enrollment.service';
import { EnrollmentModule } from './enrollment.module';
import { Enrollment } from './entities/enrollment.entity';
import { LessonProgress } from '../progress/entities/lesson-progress.entity';
import { Role } from '../../../common/guard/role/role.enum';
import {
  AlreadyEnrolledException,
  CourseNotFoundException,
  RoleForbiddenException,
} from '../../../common/exception/learning.exceptions';
import { TestingDatabaseModule, seedCourse } from '../../../../test/helpers/testing-database';

describe('EnrollmentService', () => {
  let module: TestingModule;
  let service: EnrollmentService;
  let dataSource: DataSource;

  const student = { id: 1, role: Role.STUDENT };
  const otherStudent = { id: 2, role: Role.STUDENT };
  const teacher = { id: 100, role: Role.TEACHER };

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [TestingDatabaseModule, EnrollmentModule],
    }).compile();

    service = module.get<EnrollmentService>(EnrollmentService);
    dataSource = module.get<DataSource>(DataSource);
  });

  afterEach(async () => {
    await module.close();
  });

  const countEnrollments = () => dataSource.getRepository(Enrollment).count();

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('enroll', () => {
    it('enrolls a student at 0% progress', async () => {
      const { course } = await seedCourse(dataSource, { lessons: 5 });

      const result = await service.enroll(student, 'intro-to-algebra');

      expect(result.success).toBe(true);
      expect(result.message).toBe('Enrolled successfully');
      expect(result.data?.enrollment).toMatchObject({
        student_id: 1,
        course_id: course.id,
        progress_percentage: 0,
        completed: false,
        course: { id: course.id, slug: 'intro-to-algebra', title: 'intro-to-algebra' },
      });
      expect(result.data?.enrollment.enrolled_at).toBeInstanceOf(Date);
      await expect(countEnrollments()).resolves.toBe(1);
    });

    it('accepts a numeric course id', async () => {
      const { course } = await seedCourse(dataSource, { lessons: 1 });

      const result = await service.enroll(student, String(course.id));

      expect(result.data?.enrollment.course_id).toBe(course.id);
    });

    it('refuses teachers with Forbidden', async () => {
      await seedCourse(dataSource, { teacherId: 100 });

      await expect(service.enroll(teacher, 'intro-to-algebra')).rejects.toBeInstanceOf(RoleForbiddenException);
      await expect(countEnrollments()).resolves.toBe(0);
    });

    it('refuses teachers with Forbidden even when the course does not exist', async () => {
      await expect(service.enroll(teacher, 'missing-course')).rejects.toBeInstanceOf(RoleForbiddenException);
    });

    it('reports a missing course as NotFound', async () => {
      await expect(service.enroll(student, 'missing-course')).rejects.toBeInstanceOf(CourseNotFoundException);
    });

    it('reports an unpublished course as NotFound', async () => {
      await seedCourse(dataSource, { published: false });

      await expect(service.enroll(student, 'intro-to-algebra')).rejects.toBeInstanceOf(CourseNotFoundException);
      await expect(countEnrollments()).resolves.toBe(0);
    });

    it('rejects a second enrollment in the same course', async () => {
      await seedCourse(dataSource);
      await service.enroll(student, 'intro-to-algebra');

      const attempt = service.enroll(student, 'intro-to-algebra');

      await expect(attempt).rejects.toBeInstanceOf(AlreadyEnrolledException);
      await expect(attempt).rejects.toThrow('You are already enrolled in this course');
      await expect(countEnrollments()).resolves.toBe(1);
    });

    it('lets different students enroll in the same course', async () => {
      await seedCourse(dataSource);

      await service.enroll(student, 'intro-to-algebra');
      await service.enroll(otherStudent, 'intro-to-algebra');

      await expect(countEnrollments()).resolves.toBe(2);
    });

    it('lets exactly one of several concurrent enrollments succeed', async () => {
      await seedCourse(dataSource);

      const results = await Promise.allSettled(
        Array.from({ length: 5 }, () => service.enroll(student, 'intro-to-algebra')),
      );

      const fulfilled = results.filter((result) => result.status === 'fulfilled');
      const rejected = results.filter(
        (result): result is PromiseRejectedResult => result.status === 'rejected',
      );
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(4);
      for (const result of rejected) {
        expect(result.reason).toBeInstanceOf(AlreadyEnrolledException);
      }
      await expect(countEnrollments()).resolves.toBe(1);
    });
  });

  describe('getStatus', () => {
    it('reports not enrolled, then the enrollment id', async () => {
      await seedCourse(dataSource);

      const before = await service.getStatus(student, 'intro-to-algebra');
      expect(before.data).toEqual({ enrolled: false });

      const enrolled = await service.enroll(student, 'intro-to-algebra');
      const after = await service.getStatus(student, 'intro-to-algebra');

      expect(after.data).toEqual({ enrolled: true, enrollment_id: enrolled.data?.enrollment.id });
    });

    it('does not report another student\'s enrollment', async () => {
      await seedCourse(dataSource);
      await service.enroll(otherStudent, 'intro-to-algebra');

      const status = await service.getStatus(student, 'intro-to-algebra');

      expect(status.data).toEqual({ enrolled: false });
    });

    it('hides drafts from students but not from teachers', async () => {
      await seedCourse(dataSource, { published: false });

      await expect(service.getStatus(student, 'intro-to-algebra')).rejects.toBeInstanceOf(CourseNotFoundException);
      await expect(service.getStatus(teacher, 'intro-to-algebra')).resolves.toMatchObject({
        data: { enrolled: false },
      });
    });

    it('resolves a course by numeric id and treats an out-of-range id as NotFound', async () => {
      const { course } = await seedCourse(dataSource);

      await expect(service.getStatus(student, String(course.id))).resolves.toMatchObject({ data: { enrolled: false } });
      await expect(service.getStatus(student, '99999999999999999999')).rejects.toBeInstanceOf(CourseNotFoundException);
      await expect(service.enroll(student, '2147483648')).rejects.toBeInstanceOf(CourseNotFoundException);
    });

    it('has no side effects', async () => {
      await seedCourse(dataSource);

      await service.getStatus(student, 'intro-to-algebra');

      await expect(countEnrollments()).resolves.toBe(0);
    });
  });

  describe('listForStudent', () => {
    it('orders by enrolled_at descending, then id ascending', async () => {
      await seedCourse(dataSource, { slug: 'course-a', lessons: 2 });
      await seedCourse(dataSource, { slug: 'course-b', lessons: 2 });
      await seedCourse(dataSource, { slug: 'course-c', lessons: 2 });
      const a = await service.enroll(student, 'course-a');
      const b = await service.enroll(student, 'course-b');
      const c = await service.enroll(student, 'course-c');
      const setEnrolledAt = (id: number | undefined, value: string) =>
        dataSource.query('UPDATE enrollments SET enrolled_at = ? WHERE id = ?', [value, id]);
      await setEnrolledAt(a.data?.enrollment.id, '2024-01-01 09:00:00.000');
      await setEnrolledAt(b.data?.enrollment.id, '2024-03-01 09:00:00.000');
      await setEnrolledAt(c.data?.enrollment.id, '2024-03-01 09:00:00.000');

      const result = await service.listForStudent(student);

      expect(result.data?.enrollments.map((enrollment) => enrollment.course?.slug)).toEqual([
        'course-b',
        'course-c',
        'course-a',
      ]);
    });

    it('computes progress and statistics for every enrollment', async () => {
      const { lessons } = await seedCourse(dataSource, { slug: 'course-a', lessons: 2 });
      await seedCourse(dataSource, { slug: 'course-b', lessons: 3 });
      const a = await service.enroll(student, 'course-a');
      await service.enroll(student, 'course-b');
      const progressRepo = dataSource.getRepository(LessonProgress);
      for (const lesson of lessons) {
        await progressRepo.save({ enrollment_id: a.data?.enrollment.id, lesson_id: lesson.id, completed: true });
      }

      const result = await service.listForStudent(student);

      const bySlug = new Map(result.data?.enrollments.map((enrollment) => [enrollment.course?.slug, enrollment]));
      expect(bySlug.get('course-a')).toMatchObject({ progress_percentage: 100, completed: true });
      expect(bySlug.get('course-b')).toMatchObject({ progress_percentage: 0, completed: false });
      expect(result.data?.statistics).toEqual({
        total_enrollments: 2,
        completed_enrollments: 1,
        average_progress: 50,
      });
    });

    it('returns an empty list for a student with no enrollments', async () => {
      const result = await service.listForStudent(student);

      expect(result.message).toBe('No enrollments found for this student');
      expect(result.data).toEqual({
        enrollments: [],
        statistics: { total_enrollments: 0, completed_enrollments: 0, average_progress: 0 },
      });
    });

    it('is limited to students', async () => {
      await expect(service.listForStudent(teacher)).rejects.toBeInstanceOf(RoleForbiddenException);
    });
  });
});
