import Joi from 'joi';
import type { FieldViolation } from './errorHandler';
import { present, absent } from '../models/Student';
import type { NewStudent, StudentUpdate, Field } from '../models/Student';

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: FieldViolation[] };

const CLASS_YEAR_PATTERN = /^year \d+$/;

// Joi's min/max count UTF-16 code units; these bounds count characters (code points)
const characterLength = (min: number, max?: number) =>
  Joi.string().custom((value: string, helpers) => {
    const length = [...value].length;
    if (length < min) {
      return helpers.error('string.min', { limit: min });
    }
    if (max !== undefined && length > max) {
      return helpers.error('string.max', { limit: max });
    }
    return value;
  });

// Field rules shared by the create and update payloads
const studentFields = {
  name: characterLength(2, 50),
  age: Joi.number().integer().min(1).max(99),
  class_year: Joi.string()
    .pattern(CLASS_YEAR_PATTERN)
    .messages({ 'string.pattern.base': 'class_year must look like "year 11"' })
};

type StudentPatch = Partial<NewStudent>;

export interface NameQuery {
  name: string;
}

export const schemas = {
  createStudent: Joi.object<NewStudent>({
    name: studentFields.name.required(),
    age: studentFields.age.required(),
    class_year: studentFields.class_year.required()
  }).required(),

  updateStudent: Joi.object<StudentPatch>({
    name: studentFields.name,
    age: studentFields.age,
    class_year: studentFields.class_year
  }).required(),

  searchByName: Joi.object<NameQuery>({
    name: characterLength(2).required()
  })
};

const toViolations = (error: Joi.ValidationError): FieldViolation[] =>
  error.details.map(detail => ({
    field: detail.path.length > 0 ? detail.path.join('.') : 'body',
    rule: detail.type,
    value: detail.context?.value,
    message: detail.message
  }));

export const validate = <T>(schema: Joi.ObjectSchema<T>, input: unknown): ValidationResult<T> => {
  const { error, value } = schema.validate(input, {
    abortEarly: false,
    stripUnknown: true,
    errors: { wrap: { label: false } }
  });

  if (error) {
    return { ok: false, errors: toViolations(error) };
  }
  return { ok: true, value };
};

export const validateNewStudent = (input: unknown): ValidationResult<NewStudent> =>
  validate(schemas.createStudent, input);

const fieldOf = <T>(value: T | undefined): Field<T> =>
  value === undefined ? absent<T>() : present(value);

export const validateStudentUpdate = (input: unknown): ValidationResult<StudentUpdate> => {
  const result = validate(schemas.updateStudent, input);
  if (!result.ok) {
    return result;
  }

  return {
    ok: true,
    value: {
      name: fieldOf(result.value.name),
      age: fieldOf(result.value.age),
      class_year: fieldOf(result.value.class_year)
    }
  };
};

/** Flattens an update back into the fields it sets, for re-validation and merging. */
export const presentFields = (update: StudentUpdate): StudentPatch => {
  const patch: StudentPatch = {};
  if (update.name.present) patch.name = update.name.value;
  if (update.age.present) patch.age = update.age.value;
  if (update.class_year.present) patch.class_year = update.class_year.value;
  return patch;
};

export const validateNameQuery = (input: unknown): ValidationResult<NameQuery> =>
  validate(schemas.searchByName, input);
