import { randomUUID } from 'crypto';
import type { Student, NewStudent, StudentUpdate } from '../models/Student';
import { NotFoundError, ValidationError } from '../middleware/errorHandler';
import { validate, validateNewStudent, presentFields, schemas } from '../middleware/validation';

export interface StudentStore {
  readonly size: number;
  listAll(): Student[];
  get(id: string): Student;
  searchByName(name: string): Student[];
  create(payload: NewStudent): Student;
  update(id: string, update: StudentUpdate): Student;
  delete(id: string): void;
  clear(): void;
}

/**
 * Keeps student records in a Map for the lifetime of the process.
 *
 * Every method is synchronous, so a mutation always finishes before another
 * request's handler runs. Records are copied on the way in and out; callers
 * never hold a reference into the map.
 */
export class InMemoryStudentStore implements StudentStore {
  private readonly students = new Map<string, Student>();

  constructor(private readonly generateId: () => string = randomUUID) {}

  get size(): number {
    return this.students.size;
  }

  listAll(): Student[] {
    return Array.from(this.students.values(), student => ({ ...student }));
  }

  get(id: string): Student {
    return { ...this.require(id) };
  }

  // Case-insensitive substring match
  searchByName(name: string): Student[] {
    const needle = name.toLowerCase();
    const matches = this.listAll().filter(student => student.name.toLowerCase().includes(needle));

    if (matches.length === 0) {
      throw new NotFoundError(`No students found with name '${name}'`);
    }
    return matches;
  }

  create(payload: NewStudent): Student {
    const result = validateNewStudent(payload);
    if (!result.ok) {
      throw new ValidationError(result.errors);
    }

    const student: Student = { id: this.nextId(), ...result.value };
    this.students.set(student.id, student);
    return { ...student };
  }

  update(id: string, update: StudentUpdate): Student {
    const current = this.require(id);

    const result = validate(schemas.updateStudent, presentFields(update));
    if (!result.ok) {
      throw new ValidationError(result.errors);
    }

    const updated: Student = { ...current, ...result.value, id: current.id };
    this.students.set(id, updated);
    return { ...updated };
  }

  delete(id: string): void {
    if (!this.students.delete(id)) {
      throw this.notFound(id);
    }
  }

  clear(): void {
    this.students.clear();
  }

  private require(id: string): Student {
    const student = this.students.get(id);
    if (!student) {
      throw this.notFound(id);
    }
    return student;
  }

  private nextId(): string {
    let id = this.generateId();
    while (this.students.has(id)) {
      id = this.generateId();
    }
    return id;
  }

  private notFound(id: string): NotFoundError {
    return new NotFoundError(`Student with ID ${id} not found`);
  }
}
