/**
 * Authenticated Salesforce REST client for Contacts and Events.
 *
 * Every operation goes through one execution path: take the current token,
 * send, and on an INVALID_SESSION_ID response force one token refresh and
 * send once more. A second invalid session is an AuthError; no other
 * failure is retried.
 *
 * @module record-client
 */

import type { z } from 'zod';

import {
  AppError,
  AuthError,
  SessionInvalidError,
  TransportError,
  ValidationError,
} from '../../shared/errors';
import { logger } from '../../shared/logger';
import {
  isSuccessStatus,
  type HttpMethod,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
} from './http-transport';
import { classifyFailure, isInvalidSession } from './response-classifier';
import {
  createResponseSchema,
  fieldValueSchema,
  queryResponseSchema,
  remoteRecordSchema,
} from './salesforce.schemas';
import type {
  AccessToken,
  CreatedRecord,
  Credentials,
  ListConstraints,
  OperationRequest,
  OperationResult,
  QueryResult,
  RecordFields,
  RecordList,
  RecordType,
  RemoteRecord,
} from './salesforce.types';
import { DEFAULT_LIST_LIMIT, buildListQuery } from './soql';
import type { ITokenProvider } from './token-provider';

/** One attempt with the current token, one after a forced refresh. */
export const MAX_ATTEMPTS = 2;

export interface RecordClientOptions {
  credentials: Credentials;
  tokens: ITokenProvider;
  transport: HttpTransport;
}

interface RecordCall {
  method: HttpMethod;
  /** Relative to /services/data/<version>. */
  path: string;
  query?: Record<string, string>;
  body?: RecordFields;
  /** What the call acts on, for error messages. */
  target: string;
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

function requireId(id: string, recordType: RecordType): string {
  if (id.trim() === '') {
    throw new ValidationError(`${recordType} id is required`);
  }
  return id;
}

export class RecordClient {
  private readonly credentials: Credentials;
  private readonly tokens: ITokenProvider;
  private readonly transport: HttpTransport;

  constructor(options: RecordClientOptions) {
    this.credentials = options.credentials;
    this.tokens = options.tokens;
    this.transport = options.transport;
  }

  /** Runs a validated operation request against the record API. */
  async execute(request: OperationRequest): Promise<OperationResult> {
    switch (request.kind) {
      case 'create':
        return { kind: 'created', record: await this.create(request.recordType, request.fields) };
      case 'get':
        return { kind: 'record', record: await this.get(request.recordType, request.id) };
      case 'update':
        return { kind: 'updated', id: await this.update(request.recordType, request.id, request.fields) };
      case 'delete':
        return { kind: 'deleted', id: await this.delete(request.recordType, request.id) };
      case 'list':
        return { kind: 'list', result: await this.list(request.recordType, request.constraints) };
      case 'query':
        return { kind: 'query', result: await this.query(request.soql) };
    }
  }

  // ── Contacts ─────────────────────────────────────────────────────────

  createContact(fields: RecordFields): Promise<CreatedRecord> {
    return this.create('Contact', fields);
  }

  getContact(id: string): Promise<RemoteRecord> {
    return this.get('Contact', id);
  }

  updateContact(id: string, fields: RecordFields): Promise<string> {
    return this.update('Contact', id, fields);
  }

  deleteContact(id: string): Promise<string> {
    return this.delete('Contact', id);
  }

  listContacts(constraints: ListConstraints = {}): Promise<RecordList> {
    return this.list('Contact', constraints);
  }

  // ── Events (appointments) ────────────────────────────────────────────

  createEvent(fields: RecordFields): Promise<CreatedRecord> {
    return this.create('Event', fields);
  }

  getEvent(id: string): Promise<RemoteRecord> {
    return this.get('Event', id);
  }

  updateEvent(id: string, fields: RecordFields): Promise<string> {
    return this.update('Event', id, fields);
  }

  deleteEvent(id: string): Promise<string> {
    return this.delete('Event', id);
  }

  listEvents(constraints: ListConstraints = {}): Promise<RecordList> {
    return this.list('Event', constraints);
  }

  // ── Query ────────────────────────────────────────────────────────────

  /** Runs a SOQL query via /query and returns the first page as received. */
  async query(soql: string): Promise<QueryResult> {
    if (soql.trim() === '') {
      throw new ValidationError('SOQL query is required');
    }
    const target = 'query';
    const response = await this.send({ method: 'GET', path: '/query', query: { q: soql }, target });
    const { totalSize, done, nextRecordsUrl, records } = this.parseBody(response, queryResponseSchema, target);
    return nextRecordsUrl === undefined
      ? { totalSize, done, records }
      : { totalSize, done, nextRecordsUrl, records };
  }

  // ── Generic operations ───────────────────────────────────────────────

  private async create(recordType: RecordType, fields: RecordFields): Promise<CreatedRecord> {
    const target = recordType;
    const response = await this.send({ method: 'POST', path: `/sobjects/${recordType}`, body: fields, target });
    const { id, ...rest } = this.parseBody(response, createResponseSchema, target);

    const echoed: RecordFields = {};
    for (const [name, value] of Object.entries(rest)) {
      const scalar = fieldValueSchema.safeParse(value);
      if (scalar.success) echoed[name] = scalar.data;
    }
    return { id, fields: echoed };
  }

  private async get(recordType: RecordType, id: string): Promise<RemoteRecord> {
    const target = `${recordType} ${id}`;
    const response = await this.send({ method: 'GET', path: this.recordPath(recordType, id), target });
    return this.parseBody(response, remoteRecordSchema, target);
  }

  private async update(recordType: RecordType, id: string, fields: RecordFields): Promise<string> {
    await this.send({
      method: 'PATCH',
      path: this.recordPath(recordType, id),
      body: fields,
      target: `${recordType} ${id}`,
    });
    return id;
  }

  private async delete(recordType: RecordType, id: string): Promise<string> {
    await this.send({ method: 'DELETE', path: this.recordPath(recordType, id), target: `${recordType} ${id}` });
    return id;
  }

  private async list(recordType: RecordType, constraints: ListConstraints): Promise<RecordList> {
    const limit = constraints.limit ?? DEFAULT_LIST_LIMIT;
    const soql = buildListQuery(recordType, { ...constraints, limit });
    const target = `${recordType} list`;
    const response = await this.send({ method: 'GET', path: '/query', query: { q: soql }, target });
    const { totalSize, records } = this.parseBody(response, queryResponseSchema, target);
    return { totalSize, records: records.slice(0, limit) };
  }

  // ── Execution ────────────────────────────────────────────────────────

  private recordPath(recordType: RecordType, id: string): string {
    return `/sobjects/${recordType}/${encodeURIComponent(requireId(id, recordType))}`;
  }

  /**
   * Sends the call with the current token. When the response classifies as
   * SessionInvalidError the token is refreshed once and the call repeated;
   * the second response is final.
   */
  private async send(call: RecordCall): Promise<HttpResponse> {
    let token = await this.tokens.currentToken();

    for (let attempt = 1; ; attempt++) {
      const response = await this.dispatch(this.buildRequest(call, token));

      logger.debug('Salesforce request', {
        method: call.method,
        path: call.path,
        status: response.status,
        attempt,
      });

      if (isSuccessStatus(response.status) && !isInvalidSession(response)) return response;

      const failure = classifyFailure(response, call.target);
      if (!(failure instanceof SessionInvalidError)) throw failure;

      if (attempt >= MAX_ATTEMPTS) {
        logger.error('Salesforce session still invalid after token refresh', {
          method: call.method,
          path: call.path,
        });
        throw new AuthError(`${call.target}: session still invalid after token refresh`);
      }

      logger.warn('Salesforce session invalid, refreshing access token', {
        method: call.method,
        path: call.path,
      });
      token = await this.tokens.forceRefresh(token);
    }
  }

  private async dispatch(request: HttpRequest): Promise<HttpResponse> {
    try {
      return await this.transport.send(request);
    } catch (err) {
      if (err instanceof AppError) throw err;
      throw new TransportError(
        `${request.method} ${request.url} failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  private buildRequest(call: RecordCall, token: AccessToken): HttpRequest {
    const instanceUrl = token.instanceUrl ?? this.credentials.instanceUrl;
    const search = call.query ? `?${new URLSearchParams(call.query).toString()}` : '';

    const headers: Record<string, string> = {
      Authorization: `Bearer ${token.value}`,
      Accept: 'application/json',
    };

    const request: HttpRequest = {
      method: call.method,
      url: `${instanceUrl}/services/data/${this.credentials.apiVersion}${call.path}${search}`,
      headers,
    };

    if (call.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      request.body = JSON.stringify(call.body);
    }

    return request;
  }

  private parseBody<S extends z.ZodTypeAny>(response: HttpResponse, schema: S, target: string): z.infer<S> {
    const result = schema.safeParse(parseJson(response.body));
    if (!result.success) {
      throw new TransportError(`${target}: unexpected response body from Salesforce (status ${response.status})`);
    }
    return result.data;
  }
}
