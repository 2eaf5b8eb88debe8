import { z } from 'zod';
import { fieldValueSchema } from '../salesforce/salesforce.schemas';
import { MAX_LIST_LIMIT } from '../salesforce/soql';

export const salesforceIdSchema = z
  .string()
  .regex(/^[a-zA-Z0-9]{15}(?:[a-zA-Z0-9]{3})?$/, 'must be a 15 or 18 character Salesforce id');

const isoDateTimeSchema = z
  .string()
  .datetime({ offset: true, message: 'must be an ISO-8601 datetime with timezone offset' });

const nonEmpty = (value: Record<string, unknown>): boolean =>
  Object.values(value).some((v) => v !== undefined);

// === Contacts ===

export const contactRequestSchema = z.object({
  FirstName: z.string().max(40),
  LastName: z.string().min(1).max(80),
  Phone: z.string().max(40),
  Email: z.string().email(),
});

export const contactUpdateRequestSchema = contactRequestSchema
  .partial()
  .refine(nonEmpty, { message: 'at least one field is required' });

// === Appointments (Event) ===

const appointmentFieldsSchema = z.object({
  Subject: z.string().min(1).max(255),
  StartDateTime: isoDateTimeSchema,
  EndDateTime: isoDateTimeSchema,
  WhoId: salesforceIdSchema,
});

export const appointmentRequestSchema = appointmentFieldsSchema.refine(
  (value) => Date.parse(value.EndDateTime) >= Date.parse(value.StartDateTime),
  { message: 'EndDateTime must not be before StartDateTime', path: ['EndDateTime'] },
);

export const appointmentUpdateRequestSchema = appointmentFieldsSchema
  .partial()
  .refine(nonEmpty, { message: 'at least one field is required' });

// === Tool inputs ===

const listInputSchema = z.object({
  limit: z.number().int().min(1).max(MAX_LIST_LIMIT).default(10),
  filter: z
    .record(z.string().regex(/^[A-Za-z][A-Za-z0-9_]*(\.[A-Za-z][A-Za-z0-9_]*)*$/, 'must be a field name'), fieldValueSchema)
    .optional(),
});

export const createContactInputSchema = z.object({ data: contactRequestSchema });
export const contactIdInputSchema = z.object({ contact_id: salesforceIdSchema });
export const updateContactInputSchema = z.object({
  contact_id: salesforceIdSchema,
  data: contactUpdateRequestSchema,
});
export const listContactsInputSchema = listInputSchema;

export const createAppointmentInputSchema = z.object({ data: appointmentRequestSchema });
export const eventIdInputSchema = z.object({ event_id: salesforceIdSchema });
export const updateAppointmentInputSchema = z.object({
  event_id: salesforceIdSchema,
  data: appointmentUpdateRequestSchema,
});
export const listAppointmentsInputSchema = listInputSchema;

export const queryInputSchema = z.object({
  soql: z
    .string()
    .trim()
    .min(1)
    .max(100_000)
    .regex(/^select\s/i, 'must be a SELECT statement'),
});

// === HTTP ===

export const toolParamsSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]{0,63}$/, 'must be a tool name'),
});
