import { BadRequestError } from '../middleware/error.middleware';
import type { CredentialRequest } from '../types/user.types';
import type { AssignmentInput, StudentInput } from '../types/school.types';

type Body = Record<string, unknown>;

function isBody(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Require a JSON object body
 *
 * @throws BadRequestError
 */
export function requireBody(value: unknown): Body {
  if (!isBody(value)) {
    throw new BadRequestError('Request body must be a JSON object.');
  }
  return value;
}

function stringField(body: Body, key: string): string {
  const value = body[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Extract username and password from a register/login body
 *
 * @throws BadRequestError if either field is missing
 */
export function parseCredentialRequest(value: unknown): CredentialRequest {
  const body = requireBody(value);
  const username = stringField(body, 'username');
  const password = stringField(body, 'password');

  if (!username || !password) {
    throw new BadRequestError(
      'There are missing field(s) in the request: username and password are required.'
    );
  }

  return { username, password };
}

/**
 * Keep the known student fields; anything else posted is dropped
 */
export function toStudentInput(value: unknown): StudentInput {
  const body = requireBody(value);
  return {
    firstName: stringField(body, 'firstName'),
    lastName: stringField(body, 'lastName'),
    email: stringField(body, 'email'),
  };
}

/**
 * Keep the known assignment fields; completed defaults to false
 */
export function toAssignmentInput(value: unknown): AssignmentInput {
  const body = requireBody(value);
  return {
    studentId: stringField(body, 'studentId'),
    title: stringField(body, 'title'),
    description: stringField(body, 'description'),
    dueDate: stringField(body, 'dueDate'),
    completed: body.completed === true,
  };
}
