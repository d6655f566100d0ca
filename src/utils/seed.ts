import type { NewStudent } from '../models/Student';
import type { StudentStore } from '../services/studentStore';
import { logger } from './logger';

export const DEMO_STUDENTS: NewStudent[] = [
  { name: 'John', age: 17, class_year: 'year 12' },
  { name: 'Jane', age: 16, class_year: 'year 11' }
];

export function seedStudents(store: StudentStore, students: NewStudent[] = DEMO_STUDENTS) {
  const created = students.map(student => store.create(student));
  logger.info(`Seeded ${created.length} demo students`);
  return created;
}
