import { z } from 'zod';
import { MESSAGE_ROLES } from '../../core/entities/Message.js';
import { ValidationDetails } from '../../core/entities/Result.js';

export const TITLE_MAX_LENGTH = 200;
export const DESCRIPTION_MAX_LENGTH = 500;

const REQUIRED = 'This field is required.';
const BLANK = 'This field may not be blank.';
const NOT_A_STRING = 'Not a valid string.';
const PAYLOAD_NOT_OBJECT = 'Invalid data. Expected a dictionary.';

const maxLength = (limit: number) => `Ensure this field has no more than ${limit} characters.`;

const requiredText = (limit?: number) => {
  const base = z
    .string({ required_error: REQUIRED, invalid_type_error: NOT_A_STRING })
    .trim()
    .min(1, BLANK);
  return limit === undefined ? base : base.max(limit, maxLength(limit));
};

const optionalTitle = z
  .string({ invalid_type_error: NOT_A_STRING })
  .trim()
  .max(TITLE_MAX_LENGTH, maxLength(TITLE_MAX_LENGTH))
  .nullish();

const roleField = z.enum(MESSAGE_ROLES, {
  errorMap: (issue, ctx) => ({
    message:
      issue.code === 'invalid_enum_value'
        ? `"${String(ctx.data)}" is not a valid choice.`
        : ctx.defaultError,
  }),
});

export const createConversationSchema = z.object(
  {
    title: optionalTitle,
    description: requiredText(DESCRIPTION_MAX_LENGTH),
  },
  { invalid_type_error: PAYLOAD_NOT_OBJECT, required_error: PAYLOAD_NOT_OBJECT }
);

export const updateConversationSchema = z
  .object(
    {
      title: optionalTitle,
      description: requiredText(DESCRIPTION_MAX_LENGTH).optional(),
    },
    { invalid_type_error: PAYLOAD_NOT_OBJECT, required_error: PAYLOAD_NOT_OBJECT }
  )
  .refine((changes) => changes.title !== undefined || changes.description !== undefined, {
    message: 'At least one of title or description must be provided.',
  });

export const createMessageSchema = z.object(
  {
    text: requiredText(),
    role: roleField.default('user'),
  },
  { invalid_type_error: PAYLOAD_NOT_OBJECT, required_error: PAYLOAD_NOT_OBJECT }
);

/**
 * Flattens zod issues into a field -> messages map. Issues without a path
 * (wrong payload type, cross-field rules) go under `non_field_errors`.
 */
export function toValidationDetails(error: z.ZodError): ValidationDetails {
  const details: ValidationDetails = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : 'non_field_errors';
    (details[key] ??= []).push(issue.message);
  }
  return details;
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}
