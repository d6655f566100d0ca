import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';

const studentProperties = {
  name: { type: 'string', minLength: 2, maxLength: 50, example: 'Jane Doe' },
  age: { type: 'integer', minimum: 1, maximum: 99, example: 15 },
  class_year: { type: 'string', pattern: '^year \\d+$', example: 'year 11' }
};

export const buildSwaggerSpec = (version: string) =>
  swaggerJsdoc({
    definition: {
      openapi: '3.0.0',
      info: {
        title: 'Student Management API',
        version,
        description: 'API for managing student records'
      },
      components: {
        schemas: {
          Student: {
            type: 'object',
            required: ['id', 'name', 'age', 'class_year'],
            properties: {
              id: { type: 'string', format: 'uuid', description: 'Unique student identifier' },
              ...studentProperties
            }
          },
          NewStudent: {
            type: 'object',
            required: ['name', 'age', 'class_year'],
            properties: studentProperties
          },
          StudentUpdate: {
            type: 'object',
            properties: studentProperties
          },
          FieldViolation: {
            type: 'object',
            properties: {
              field: { type: 'string' },
              rule: { type: 'string' },
              value: {},
              message: { type: 'string' }
            }
          },
          Error: {
            type: 'object',
            properties: {
              success: { type: 'boolean', example: false },
              message: { type: 'string' },
              errors: {
                type: 'array',
                items: { $ref: '#/components/schemas/FieldViolation' }
              }
            }
          }
        },
        parameters: {
          StudentId: {
            in: 'path',
            name: 'id',
            required: true,
            description: 'Student ID',
            schema: { type: 'string' }
          }
        },
        responses: {
          NotFound: {
            description: 'No matching student',
            content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } }
          },
          ValidationFailed: {
            description: 'The payload breaks a field constraint',
            content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } }
          }
        }
      }
    },
    apis: [path.join(__dirname, '..', 'routes', '*.{ts,js}')]
  });
