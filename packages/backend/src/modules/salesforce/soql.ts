import { ValidationError } from '../../shared/errors';
import type { FieldValue, ListConstraints, RecordType } from './salesforce.types';

export const DEFAULT_LIST_LIMIT = 10;
export const MAX_LIST_LIMIT = 2000;

interface ListShape {
  columns: string[];
  orderBy: string;
}

const LIST_SHAPES: Record<RecordType, ListShape> = {
  Contact: {
    columns: ['Id', 'FirstName', 'LastName', 'Phone', 'Email'],
    orderBy: 'CreatedDate DESC',
  },
  Event: {
    columns: ['Id', 'Subject', 'StartDateTime', 'EndDateTime', 'WhoId'],
    orderBy: 'StartDateTime DESC',
  },
};

const FIELD_NAME = /^[A-Za-z][A-Za-z0-9_]*(\.[A-Za-z][A-Za-z0-9_]*)*$/;

// SOQL date and dateTime literals are written unquoted.
const DATE_LITERAL = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2}))?$/;

export function soqlLiteral(value: FieldValue): string {
  if (value === null) return 'null';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`Cannot filter on non-finite number ${value}`);
    }
    return String(value);
  }
  if (DATE_LITERAL.test(value)) return value;
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

export function buildListQuery(recordType: RecordType, constraints: ListConstraints = {}): string {
  const { columns, orderBy } = LIST_SHAPES[recordType];
  const limit = constraints.limit ?? DEFAULT_LIST_LIMIT;

  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
    throw new ValidationError(`limit must be an integer between 1 and ${MAX_LIST_LIMIT}, got ${limit}`);
  }

  const clauses = Object.entries(constraints.filter ?? {}).map(([field, value]) => {
    if (!FIELD_NAME.test(field)) {
      throw new ValidationError(`Invalid filter field name: "${field}"`);
    }
    return `${field} = ${soqlLiteral(value)}`;
  });

  const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';
  return `SELECT ${columns.join(', ')} FROM ${recordType}${where} ORDER BY ${orderBy} LIMIT ${limit}`;
}
