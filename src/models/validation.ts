import Joi from 'joi';
import { QUESTIONNAIRE_LENGTH, Sex, Submission } from '../types/models';
import { Result, ValidationError, err, ok } from '../types/errors';

/**
 * Validation schemas and functions for incoming submissions and query parameters
 */

interface RawSubmission {
  age: number;
  sex: string;
  responses: boolean[];
  consent?: boolean | null;
}

// Key order matters: with abortEarly the first failing key decides the reported field
export const submissionSchema = Joi.object<RawSubmission>({
  responses: Joi.array()
    .items(Joi.boolean().strict())
    .length(QUESTIONNAIRE_LENGTH)
    .required()
    .messages({
      'array.length': `Expected exactly ${QUESTIONNAIRE_LENGTH} responses`,
      'boolean.base': 'Every response must be true or false'
    }),
  age: Joi.number()
    .integer()
    .min(1)
    .max(120)
    .strict()
    .required()
    .messages({
      'number.min': 'Age must be between 1 and 120',
      'number.max': 'Age must be between 1 and 120'
    }),
  sex: Joi.string()
    .valid('M', 'F')
    .insensitive()
    .required()
    .messages({
      'any.only': 'Sex must be M or F',
      'string.base': 'Sex must be M or F',
      'any.required': 'Sex must be M or F'
    }),
  consent: Joi.boolean().strict().allow(null).optional()
})
  .unknown(true)
  .required();

export interface PaginationParams {
  limit: number;
  offset: number;
}

export const paginationSchema = Joi.object<PaginationParams>({
  limit: Joi.number().integer().min(1).max(1000).default(100),
  offset: Joi.number().integer().min(0).default(0)
}).unknown(true);

function toSex(value: string): Sex {
  return value.toUpperCase() === 'F' ? 'F' : 'M';
}

function toValidationError(detail: Joi.ValidationErrorItem): ValidationError {
  const [key] = detail.path;

  switch (key) {
    case 'responses':
      return new ValidationError(
        detail.type === 'array.length' ? 'responses.length' : 'responses.type',
        detail.message
      );
    case 'age':
      return new ValidationError(
        detail.type === 'number.min' || detail.type === 'number.max' ? 'age.range' : 'age.type',
        detail.message
      );
    case 'sex':
      return new ValidationError('sex.enum', detail.message);
    case 'consent':
      return new ValidationError('consent.type', detail.message);
    default:
      return new ValidationError('submission.type', 'Submission must be an object with age, sex and responses');
  }
}

// Joi checks array items before length; a wrong count must win over a bad item
function checkResponseCount(raw: unknown): ValidationError | null {
  if (typeof raw !== 'object' || raw === null || !('responses' in raw)) {
    return null;
  }
  const { responses } = raw;
  if (Array.isArray(responses) && responses.length !== QUESTIONNAIRE_LENGTH) {
    return new ValidationError('responses.length', `Expected exactly ${QUESTIONNAIRE_LENGTH} responses`);
  }
  return null;
}

/**
 * Check structure and ranges of a raw submission and normalize sex to its
 * canonical uppercase form. Consent is type-checked only; null counts as absent.
 */
export function validateSubmission(raw: unknown): Result<Submission, ValidationError> {
  const countError = checkResponseCount(raw);
  if (countError) {
    return err(countError);
  }

  const { error, value } = submissionSchema.validate(raw, { abortEarly: true });

  if (error) {
    return err(toValidationError(error.details[0]));
  }
  if (value === undefined) {
    return err(new ValidationError('submission.type', 'Submission is required'));
  }

  const submission: Submission = {
    age: value.age,
    sex: toSex(value.sex),
    responses: [...value.responses]
  };
  if (value.consent !== undefined && value.consent !== null) {
    submission.consent = value.consent;
  }

  return ok(submission);
}

export function validatePagination(query: unknown): Result<PaginationParams, ValidationError> {
  const { error, value } = paginationSchema.validate(query, { abortEarly: true });

  if (error) {
    const [key] = error.details[0].path;
    return err(new ValidationError(key === 'offset' ? 'offset.range' : 'limit.range', error.message));
  }
  if (value === undefined) {
    return ok({ limit: 100, offset: 0 });
  }

  return ok({ limit: value.limit, offset: value.offset });
}
