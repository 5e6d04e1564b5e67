export enum Role {
  TEACHER = 'teacher',
  STUDENT = 'student',
}

export function isRole(value: unknown): value is Role {
  return value === Role.TEACHER || value === Role.STUDENT;
}
