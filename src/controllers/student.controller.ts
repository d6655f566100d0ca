import type { Request, Response } from 'express';
import { asyncHandler, ValidationError } from '../middleware/errorHandler';
import { validateNewStudent, validateStudentUpdate, validateNameQuery } from '../middleware/validation';
import type { StudentStore } from '../services/studentStore';
import { logger } from '../utils/logger';

export class StudentController {
  constructor(private readonly store: StudentStore) {}

  list = asyncHandler((req: Request, res: Response) => {
    res.json(this.store.listAll());
  });

  getById = asyncHandler((req: Request, res: Response) => {
    res.json(this.store.get(req.params.id));
  });

  searchByName = asyncHandler((req: Request, res: Response) => {
    const query = validateNameQuery(req.query);
    if (!query.ok) {
      throw new ValidationError(query.errors);
    }

    res.json(this.store.searchByName(query.value.name));
  });

  create = asyncHandler((req: Request, res: Response) => {
    const payload = validateNewStudent(req.body);
    if (!payload.ok) {
      throw new ValidationError(payload.errors);
    }

    const student = this.store.create(payload.value);
    logger.info(`Created student ${student.id}`);

    res.status(201).json(student);
  });

  update = asyncHandler((req: Request, res: Response) => {
    const update = validateStudentUpdate(req.body);
    if (!update.ok) {
      throw new ValidationError(update.errors);
    }

    res.json(this.store.update(req.params.id, update.value));
  });

  remove = asyncHandler((req: Request, res: Response) => {
    this.store.delete(req.params.id);
    logger.info(`Deleted student ${req.params.id}`);

    res.status(204).end();
  });
}
