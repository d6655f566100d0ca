import { Router } from 'express';
import { StudentController } from '../controllers/student.controller';
import type { StudentStore } from '../services/studentStore';

/**
 * @openapi
 * tags:
 *   - name: Students
 *   - name: Search
 */
export const createStudentRoutes = (store: StudentStore): Router => {
  const router = Router();
  const controller = new StudentController(store);

  /**
   * @openapi
   * /students:
   *   get:
   *     summary: Get all students
   *     tags: [Students]
   *     responses:
   *       200:
   *         description: Every stored student, in insertion order
   *         content:
   *           application/json:
   *             schema:
   *               type: array
   *               items:
   *                 $ref: '#/components/schemas/Student'
   */
  router.get('/', controller.list);

  /**
   * @openapi
   * /students/search/by-name:
   *   get:
   *     summary: Search students by name
   *     description: Case-insensitive substring match on the student name.
   *     tags: [Students, Search]
   *     parameters:
   *       - in: query
   *         name: name
   *         required: true
   *         schema:
   *           type: string
   *           minLength: 2
   *     responses:
   *       200:
   *         description: Matching students
   *         content:
   *           application/json:
   *             schema:
   *               type: array
   *               items:
   *                 $ref: '#/components/schemas/Student'
   *       404:
   *         $ref: '#/components/responses/NotFound'
   *       422:
   *         $ref: '#/components/responses/ValidationFailed'
   */
  router.get('/search/by-name', controller.searchByName);

  /**
   * @openapi
   * /students/{id}:
   *   get:
   *     summary: Get student by ID
   *     tags: [Students]
   *     parameters:
   *       - $ref: '#/components/parameters/StudentId'
   *     responses:
   *       200:
   *         description: The student
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Student'
   *       404:
   *         $ref: '#/components/responses/NotFound'
   */
  router.get('/:id', controller.getById);

  /**
   * @openapi
   * /students:
   *   post:
   *     summary: Create new student
   *     tags: [Students]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/NewStudent'
   *     responses:
   *       201:
   *         description: The created student with its generated id
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Student'
   *       422:
   *         $ref: '#/components/responses/ValidationFailed'
   */
  router.post('/', controller.create);

  /**
   * @openapi
   * /students/{id}:
   *   patch:
   *     summary: Update student information
   *     description: Only the fields present in the body are changed.
   *     tags: [Students]
   *     parameters:
   *       - $ref: '#/components/parameters/StudentId'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/StudentUpdate'
   *     responses:
   *       200:
   *         description: The updated student
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Student'
   *       404:
   *         $ref: '#/components/responses/NotFound'
   *       422:
   *         $ref: '#/components/responses/ValidationFailed'
   */
  router.patch('/:id', controller.update);

  /**
   * @openapi
   * /students/{id}:
   *   delete:
   *     summary: Delete a student
   *     tags: [Students]
   *     parameters:
   *       - $ref: '#/components/parameters/StudentId'
   *     responses:
   *       204:
   *         description: Deleted
   *       404:
   *         $ref: '#/components/responses/NotFound'
   */
  router.delete('/:id', controller.remove);

  return router;
};
