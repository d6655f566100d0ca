/**
 * A student record as stored and returned by the API.
 *
 * Field names follow the JSON wire format, so `class_year` stays snake case.
 */
export interface Student {
  id: string;
  name: string;
  age: number;
  class_year: string;
}

/** Payload accepted when creating a student. The id is always generated server-side. */
export type NewStudent = Omit<Student, 'id'>;

/** Marks whether a partial-update field was supplied. */
export type Field<T> = { present: true; value: T } | { present: false };

export interface StudentUpdate {
  name: Field<string>;
  age: Field<number>;
  class_year: Field<string>;
}

export const present = <T>(value: T): Field<T> => ({ present: true, value });

export const absent = <T>(): Field<T> => ({ present: false });

export const emptyUpdate = (): StudentUpdate => ({
  name: absent(),
  age: absent(),
  class_year: absent()
});
