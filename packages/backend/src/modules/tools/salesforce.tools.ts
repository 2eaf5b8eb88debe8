import type { FieldValue, RecordFields } from '../salesforce/salesforce.types';
import { defineTool, type Tool } from './tool-registry';
import {
  contactIdInputSchema,
  createAppointmentInputSchema,
  createContactInputSchema,
  eventIdInputSchema,
  listAppointmentsInputSchema,
  listContactsInputSchema,
  queryInputSchema,
  updateAppointmentInputSchema,
  updateContactInputSchema,
} from './tools.schemas';

/** Drops keys a partial update left undefined. */
function definedFields(data: Record<string, FieldValue | undefined>): RecordFields {
  const fields: RecordFields = {};
  for (const [name, value] of Object.entries(data)) {
    if (value !== undefined) fields[name] = value;
  }
  return fields;
}

// ── Contacts ─────────────────────────────────────────────────────────

const createContact = defineTool({
  name: 'salesforce_create_contact',
  description: 'Create a Salesforce Contact. Returns the new Contact Id.',
  inputSchema: createContactInputSchema,
  async handler(client, { data }) {
    const created = await client.createContact(data);
    return { Id: created.id };
  },
});

const getContact = defineTool({
  name: 'salesforce_get_contact',
  description: 'Fetch a Salesforce Contact by Id.',
  inputSchema: contactIdInputSchema,
  handler: (client, { contact_id }) => client.getContact(contact_id),
});

const updateContact = defineTool({
  name: 'salesforce_update_contact',
  description: 'Update fields on a Salesforce Contact by Id.',
  inputSchema: updateContactInputSchema,
  async handler(client, { contact_id, data }) {
    await client.updateContact(contact_id, definedFields(data));
    return { status: 'success', contact_id };
  },
});

const deleteContact = defineTool({
  name: 'salesforce_delete_contact',
  description: 'Delete a Salesforce Contact by Id.',
  inputSchema: contactIdInputSchema,
  async handler(client, { contact_id }) {
    await client.deleteContact(contact_id);
    return { status: 'success' };
  },
});

const listContacts = defineTool({
  name: 'salesforce_list_contacts',
  description: 'List recent Salesforce Contacts, newest first, optionally filtered by field equality.',
  inputSchema: listContactsInputSchema,
  handler: (client, { limit, filter }) => client.listContacts({ limit, filter }),
});

// ── Appointments (sObject Event) ─────────────────────────────────────

const createAppointment = defineTool({
  name: 'salesforce_create_appointment',
  description: 'Create a Salesforce appointment (Event) linked to a Contact. Returns the new Event Id.',
  inputSchema: createAppointmentInputSchema,
  async handler(client, { data }) {
    const created = await client.createEvent(data);
    return { Id: created.id };
  },
});

const getAppointment = defineTool({
  name: 'salesforce_get_appointment',
  description: 'Fetch a Salesforce appointment (Event) by Id.',
  inputSchema: eventIdInputSchema,
  handler: (client, { event_id }) => client.getEvent(event_id),
});

const updateAppointment = defineTool({
  name: 'salesforce_update_appointment',
  description: 'Update fields on a Salesforce appointment (Event) by Id.',
  inputSchema: updateAppointmentInputSchema,
  async handler(client, { event_id, data }) {
    await client.updateEvent(event_id, definedFields(data));
    return { status: 'success', event_id };
  },
});

const deleteAppointment = defineTool({
  name: 'salesforce_delete_appointment',
  description: 'Delete a Salesforce appointment (Event) by Id.',
  inputSchema: eventIdInputSchema,
  async handler(client, { event_id }) {
    await client.deleteEvent(event_id);
    return { status: 'success' };
  },
});

const listAppointments = defineTool({
  name: 'salesforce_list_appointments',
  description: 'List Salesforce appointments (Events), latest start first, optionally filtered by field equality.',
  inputSchema: listAppointmentsInputSchema,
  handler: (client, { limit, filter }) => client.listEvents({ limit, filter }),
});

// ── Query ────────────────────────────────────────────────────────────

const query = defineTool({
  name: 'salesforce_query',
  description: 'Run a SOQL SELECT via the Salesforce /query endpoint and return the first page.',
  inputSchema: queryInputSchema,
  handler: (client, { soql }) => client.query(soql),
});

export const salesforceTools: Tool[] = [
  createContact,
  getContact,
  updateContact,
  deleteContact,
  listContacts,
  createAppointment,
  getAppointment,
  updateAppointment,
  deleteAppointment,
  listAppointments,
  query,
];
