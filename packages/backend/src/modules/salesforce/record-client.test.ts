import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RecordClient } from './record-client';
import { TokenProvider } from './token-provider';
import {
  AuthError,
  NotFoundError,
  RateLimitedError,
  SessionInvalidError,
  TransportError,
  ValidationError,
} from '../../shared/errors';
import type { HttpResponse } from './http-transport';
import {
  API_BASE,
  FakeTransport,
  INVALID_SESSION,
  TEST_CREDENTIALS,
  deferred,
  json,
  noContent,
} from '../../../tests/support/fake-transport';

const CONTACT_ID = '003000000000001AAA';
const EVENT_ID = '00U000000000001AAA';

const contactRecord = {
  attributes: { type: 'Contact', url: `/services/data/v60.0/sobjects/Contact/${CONTACT_ID}` },
  Id: CONTACT_ID,
  FirstName: 'Jane',
  LastName: 'Doe',
  Email: 'jane@example.com',
};

function queryPage(records: Array<Record<string, unknown>>, totalSize = records.length) {
  return json(200, { totalSize, done: true, records });
}

describe('RecordClient', () => {
  let transport: FakeTransport;
  let tokens: TokenProvider;
  let client: RecordClient;

  beforeEach(() => {
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    transport = new FakeTransport();
    tokens = new TokenProvider({ credentials: TEST_CREDENTIALS, transport });
    client = new RecordClient({ credentials: TEST_CREDENTIALS, tokens, transport });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('create', () => {
    it('posts the fields and returns the new id with echoed fields', async () => {
      await tokens.currentToken();
      transport.recordHandler = () => json(201, { id: CONTACT_ID, success: true, errors: [] });

      const created = await client.createContact({ FirstName: 'Jane', LastName: 'Doe', Email: 'jane@example.com' });

      expect(created).toEqual({ id: CONTACT_ID, fields: { success: true } });
      expect(transport.recordRequests).toHaveLength(1);
      expect(transport.tokenRequests).toHaveLength(1);

      const [request] = transport.recordRequests;
      expect(request.method).toBe('POST');
      expect(request.url).toBe(`${API_BASE}/sobjects/Contact`);
      expect(request.headers).toEqual({
        Authorization: 'Bearer token-1',
        Accept: 'application/json',
        'Content-Type': 'application/json',
      });
      expect(JSON.parse(request.body ?? '')).toEqual({ FirstName: 'Jane', LastName: 'Doe', Email: 'jane@example.com' });
    });

    it('fetches a token lazily before the first record call', async () => {
      transport.recordHandler = () => json(201, { id: EVENT_ID, success: true, errors: [] });

      await client.createEvent({ Subject: 'Site visit', WhoId: CONTACT_ID });

      expect(transport.requests.map((r) => r.method)).toEqual(['POST', 'POST']);
      expect(transport.tokenRequests).toHaveLength(1);
      expect(transport.recordRequests[0].url).toBe(`${API_BASE}/sobjects/Event`);
    });

    it('raises ValidationError when Salesforce rejects the payload', async () => {
      transport.recordHandler = () =>
        json(400, [{ message: 'Required fields are missing: [LastName]', errorCode: 'REQUIRED_FIELD_MISSING', fields: ['LastName'] }]);

      const promise = client.createContact({ FirstName: 'Jane' });

      await expect(promise).rejects.toBeInstanceOf(ValidationError);
      await expect(promise).rejects.toThrow('Contact: REQUIRED_FIELD_MISSING: Required fields are missing: [LastName]');
      expect(transport.tokenRequests).toHaveLength(1);
    });

    it('raises TransportError when the success body has no id', async () => {
      transport.recordHandler = () => json(201, { success: true });

      await expect(client.createContact({ LastName: 'Doe' })).rejects.toThrow(
        'Contact: unexpected response body from Salesforce (status 201)',
      );
    });
  });

  describe('get', () => {
    it('returns the record as Salesforce sent it', async () => {
      transport.recordHandler = () => json(200, contactRecord);

      const record = await client.getContact(CONTACT_ID);

      expect(record).toEqual(contactRecord);
      expect(transport.recordRequests[0]).toMatchObject({ method: 'GET', url: `${API_BASE}/sobjects/Contact/${CONTACT_ID}` });
      expect(transport.recordRequests[0].body).toBeUndefined();
      expect(transport.recordRequests[0].headers['Content-Type']).toBeUndefined();
    });

    it('refreshes once and retries after an invalid session', async () => {
      await tokens.currentToken();
      transport.recordHandler = (request) =>
        request.headers.Authorization === 'Bearer token-1' ? INVALID_SESSION : json(200, contactRecord);

      const record = await client.getContact(CONTACT_ID);

      expect(record).toEqual(contactRecord);
      expect(transport.recordRequests).toHaveLength(2);
      expect(transport.tokenRequests).toHaveLength(2);
      expect(transport.bearerTokens).toEqual(['token-1', 'token-2']);
    });

    it('raises NotFoundError for an unknown id', async () => {
      transport.recordHandler = () =>
        json(404, [{ message: 'The requested resource does not exist', errorCode: 'NOT_FOUND' }]);

      await expect(client.getEvent(EVENT_ID)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('encodes the id into the path', async () => {
      transport.recordHandler = () => json(200, contactRecord);

      await client.getContact('a/b');

      expect(transport.recordRequests[0].url).toBe(`${API_BASE}/sobjects/Contact/a%2Fb`);
    });

    it('rejects a blank id without calling Salesforce', async () => {
      await expect(client.getContact('  ')).rejects.toThrow('Contact id is required');
      expect(transport.recordRequests).toHaveLength(0);
    });

    it('raises TransportError when the body is not JSON', async () => {
      transport.recordHandler = () => ({ status: 200, headers: {}, body: '<html></html>' });

      await expect(client.getContact(CONTACT_ID)).rejects.toBeInstanceOf(TransportError);
    });
  });

  describe('update', () => {
    it('patches the partial fields and returns the id', async () => {
      transport.recordHandler = () => noContent();

      const id = await client.updateContact(CONTACT_ID, { Phone: '+1-555-0100' });

      expect(id).toBe(CONTACT_ID);
      const [request] = transport.recordRequests;
      expect(request.method).toBe('PATCH');
      expect(request.url).toBe(`${API_BASE}/sobjects/Contact/${CONTACT_ID}`);
      expect(request.body).toBe('{"Phone":"+1-555-0100"}');
    });

    it('surfaces NotFoundError and ValidationError as returned', async () => {
      transport.recordHandler = () => json(404, [{ message: 'entity is deleted', errorCode: 'ENTITY_IS_DELETED' }]);
      await expect(client.updateEvent(EVENT_ID, { Subject: 'Moved' })).rejects.toBeInstanceOf(NotFoundError);

      transport.recordHandler = () =>
        json(400, [{ message: 'End must be after start', errorCode: 'FIELD_CUSTOM_VALIDATION_EXCEPTION' }]);
      await expect(client.updateEvent(EVENT_ID, { EndDateTime: '2020-01-01T00:00:00Z' })).rejects.toBeInstanceOf(
        ValidationError,
      );
    });
  });

  describe('delete', () => {
    it('deletes by id', async () => {
      transport.recordHandler = () => noContent();

      await expect(client.deleteContact(CONTACT_ID)).resolves.toBe(CONTACT_ID);
      expect(transport.recordRequests[0]).toMatchObject({
        method: 'DELETE',
        url: `${API_BASE}/sobjects/Contact/${CONTACT_ID}`,
      });
    });

    it('raises NotFoundError for a missing event with one call and no refresh', async () => {
      await tokens.currentToken();
      transport.recordHandler = () =>
        json(404, [{ message: 'The requested resource does not exist', errorCode: 'NOT_FOUND' }]);

      await expect(client.deleteEvent(EVENT_ID)).rejects.toBeInstanceOf(NotFoundError);
      expect(transport.recordRequests).toHaveLength(1);
      expect(transport.tokenRequests).toHaveLength(1);
    });

    it('surfaces NotFoundError on a repeated delete', async () => {
      let deleted = false;
      transport.recordHandler = () => {
        if (deleted) return json(404, [{ message: 'entity is deleted', errorCode: 'ENTITY_IS_DELETED' }]);
        deleted = true;
        return noContent();
      };

      await client.deleteContact(CONTACT_ID);
      await expect(client.deleteContact(CONTACT_ID)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('list', () => {
    it('encodes the limit in the query and returns records in remote order', async () => {
      const records = [
        { Id: '003000000000003AAA', LastName: 'Cole' },
        { Id: '003000000000001AAA', LastName: 'Abe' },
        { Id: '003000000000002AAA', LastName: 'Bly' },
      ];
      transport.recordHandler = () => queryPage(records, 57);

      const result = await client.listContacts({ limit: 3 });

      expect(result).toEqual({ totalSize: 57, records });
      expect(transport.recordRequests).toHaveLength(1);

      const url = new URL(transport.recordRequests[0].url);
      expect(url.pathname).toBe('/services/data/v60.0/query');
      expect(url.searchParams.get('q')).toBe(
        'SELECT Id, FirstName, LastName, Phone, Email FROM Contact ORDER BY CreatedDate DESC LIMIT 3',
      );
    });

    it('never returns more records than the limit', async () => {
      transport.recordHandler = () => queryPage([{ Id: 'a' }, { Id: 'b' }, { Id: 'c' }, { Id: 'd' }]);

      const result = await client.listEvents({ limit: 2 });

      expect(result.records).toEqual([{ Id: 'a' }, { Id: 'b' }]);
    });

    it('defaults the limit to 10 and applies the filter', async () => {
      transport.recordHandler = () => queryPage([]);

      await client.listEvents({ filter: { WhoId: CONTACT_ID } });

      const url = new URL(transport.recordRequests[0].url);
      expect(url.searchParams.get('q')).toBe(
        `SELECT Id, Subject, StartDateTime, EndDateTime, WhoId FROM Event WHERE WhoId = '${CONTACT_ID}' ORDER BY StartDateTime DESC LIMIT 10`,
      );
    });

    it('rejects an out-of-range limit before any call', async () => {
      await expect(client.listContacts({ limit: 0 })).rejects.toBeInstanceOf(ValidationError);
      expect(transport.requests).toHaveLength(0);
    });
  });

  describe('query', () => {
    it('runs the SOQL and returns the page as received', async () => {
      transport.recordHandler = () =>
        json(200, {
          totalSize: 3000,
          done: false,
          nextRecordsUrl: '/services/data/v60.0/query/01g-2000',
          records: [{ Id: CONTACT_ID }],
        });

      const result = await client.query('SELECT Id FROM Contact');

      expect(result).toEqual({
        totalSize: 3000,
        done: false,
        nextRecordsUrl: '/services/data/v60.0/query/01g-2000',
        records: [{ Id: CONTACT_ID }],
      });
      expect(new URL(transport.recordRequests[0].url).searchParams.get('q')).toBe('SELECT Id FROM Contact');
    });

    it('reports MALFORMED_QUERY as ValidationError', async () => {
      transport.recordHandler = () => json(400, [{ message: 'unexpected token: FORM', errorCode: 'MALFORMED_QUERY' }]);

      await expect(client.query('SELECT Id FORM Contact')).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects an empty query', async () => {
      await expect(client.query('')).rejects.toThrow('SOQL query is required');
    });
  });

  describe('retry bound', () => {
    it('fails with AuthError when the retry also reports an invalid session', async () => {
      transport.recordHandler = () => INVALID_SESSION;

      const promise = client.getContact(CONTACT_ID);

      await expect(promise).rejects.toBeInstanceOf(AuthError);
      await expect(promise).rejects.toThrow(`Contact ${CONTACT_ID}: session still invalid after token refresh`);
      expect(transport.recordRequests).toHaveLength(2);
      expect(transport.tokenRequests).toHaveLength(2);
    });

    it('surfaces AuthError when the forced refresh itself fails', async () => {
      await tokens.currentToken();
      transport.recordHandler = () => INVALID_SESSION;
      transport.tokenHandler = () => json(400, { error: 'invalid_grant', error_description: 'token revoked' });

      await expect(client.deleteContact(CONTACT_ID)).rejects.toThrow(
        'Salesforce token refresh failed (400): invalid_grant: token revoked',
      );
      expect(transport.recordRequests).toHaveLength(1);
    });

    it('classifies the retry response normally when it is not a session error', async () => {
      transport.recordHandler = (request) =>
        request.headers.Authorization === 'Bearer token-1'
          ? INVALID_SESSION
          : json(404, [{ message: 'gone', errorCode: 'NOT_FOUND' }]);

      await expect(client.getContact(CONTACT_ID)).rejects.toBeInstanceOf(NotFoundError);
      expect(transport.recordRequests).toHaveLength(2);
    });
  });

  describe('no retry on other failures', () => {
    const failures: Array<[string, () => HttpResponse, new (...args: never[]) => Error]> = [
      ['validation', () => json(400, [{ message: 'bad', errorCode: 'INVALID_FIELD' }]), ValidationError],
      ['not found', () => json(404, [{ message: 'gone', errorCode: 'NOT_FOUND' }]), NotFoundError],
      ['rate limit', () => json(429, [], { 'retry-after': '5' }), RateLimitedError],
      ['server error', () => json(500, [{ message: 'boom', errorCode: 'UNKNOWN_EXCEPTION' }]), TransportError],
    ];

    it.each(failures)('%s fails after one call with no refresh', async (_label, respond, ErrorClass) => {
      await tokens.currentToken();
      transport.recordHandler = respond;

      await expect(client.getContact(CONTACT_ID)).rejects.toBeInstanceOf(ErrorClass);
      expect(transport.recordRequests).toHaveLength(1);
      expect(transport.tokenRequests).toHaveLength(1);
    });

    it('passes the retry-after hint through', async () => {
      transport.recordHandler = () => json(429, [], { 'retry-after': '5' });

      await expect(client.listContacts()).rejects.toMatchObject({ retryAfterSeconds: 5 });
    });

    it('does not retry a transport failure', async () => {
      await tokens.currentToken();
      transport.recordHandler = () => {
        throw new TransportError('GET failed: ECONNRESET');
      };

      await expect(client.getContact(CONTACT_ID)).rejects.toThrow('GET failed: ECONNRESET');
      expect(transport.recordRequests).toHaveLength(1);
      expect(transport.tokenRequests).toHaveLength(1);
    });

    it('wraps unexpected transport exceptions in TransportError', async () => {
      transport.recordHandler = () => {
        throw new Error('socket hang up');
      };

      const promise = client.getContact(CONTACT_ID);

      await expect(promise).rejects.toBeInstanceOf(TransportError);
      await expect(promise).rejects.toThrow(`GET ${API_BASE}/sobjects/Contact/${CONTACT_ID} failed: socket hang up`);
    });
  });

  describe('token endpoint failure on first use', () => {
    it('raises AuthError before any record call', async () => {
      transport.tokenHandler = () => json(401, { error: 'invalid_client', error_description: 'invalid client credentials' });

      await expect(client.createContact({ LastName: 'Doe' })).rejects.toBeInstanceOf(AuthError);
      expect(transport.tokenRequests).toHaveLength(1);
      expect(transport.recordRequests).toHaveLength(0);
    });
  });

  describe('concurrent invalid sessions', () => {
    it('share one refresh and all retry with its token', async () => {
      await tokens.currentToken();

      const held = Array.from({ length: 4 }, () => deferred<HttpResponse>());
      let call = 0;
      transport.recordHandler = (request) => {
        if (request.headers.Authorization === 'Bearer token-1') return held[call++].promise;
        return json(200, contactRecord);
      };

      const operations = held.map(() => client.getContact(CONTACT_ID));
      await vi.waitFor(() => expect(call).toBe(4));
      held.forEach((h) => h.resolve(INVALID_SESSION));

      const results = await Promise.all(operations);

      expect(results).toHaveLength(4);
      expect(transport.tokenRequests).toHaveLength(2);
      expect(transport.bearerTokens.filter((t) => t === 'token-2')).toHaveLength(4);
    });

    it('reuses an already refreshed token for a late invalid-session response', async () => {
      await tokens.currentToken();

      const late = deferred<HttpResponse>();
      let firstTokenCalls = 0;
      transport.recordHandler = (request) => {
        if (request.headers.Authorization !== 'Bearer token-1') return json(200, contactRecord);
        firstTokenCalls += 1;
        return firstTokenCalls === 1 ? late.promise : INVALID_SESSION;
      };

      const slow = client.getContact(CONTACT_ID);
      await vi.waitFor(() => expect(firstTokenCalls).toBe(1));
      const fast = client.getContact(CONTACT_ID);
      await fast;

      late.resolve(INVALID_SESSION);
      await slow;

      expect(transport.tokenRequests).toHaveLength(2);
      expect(transport.bearerTokens).toEqual(['token-1', 'token-1', 'token-2', 'token-2']);
    });
  });

  describe('session signal', () => {
    it('refreshes when INVALID_SESSION_ID arrives in a success-status body', async () => {
      await tokens.currentToken();
      transport.recordHandler = (request) =>
        request.headers.Authorization === 'Bearer token-1'
          ? json(200, [{ message: 'Session expired or invalid', errorCode: 'INVALID_SESSION_ID' }])
          : json(200, contactRecord);

      await expect(client.getContact(CONTACT_ID)).resolves.toEqual(contactRecord);
      expect(transport.bearerTokens).toEqual(['token-1', 'token-2']);
    });

    it('never lets SessionInvalidError reach the caller', async () => {
      await tokens.currentToken();
      transport.recordHandler = () => json(403, [{ message: 'Session expired or invalid', errorCode: 'INVALID_SESSION_ID' }]);

      const err = await client.getContact(CONTACT_ID).catch((e: unknown) => e);

      expect(err).not.toBeInstanceOf(SessionInvalidError);
      expect(err).toBeInstanceOf(AuthError);
      expect(transport.recordRequests).toHaveLength(2);
    });
  });

  describe('invalid session during a refresh in flight', () => {
    it('waits for the running refresh instead of retrying with a token already refused', async () => {
      const heldExchange = deferred<HttpResponse>();
      let exchanges = 0;
      transport.tokenHandler = () => {
        exchanges += 1;
        return exchanges < 3 ? json(200, { access_token: `token-${exchanges}` }) : heldExchange.promise;
      };

      const lateFirst = deferred<HttpResponse>();
      let firstTokenCalls = 0;
      transport.recordHandler = (request) => {
        switch (request.headers.Authorization) {
          case 'Bearer token-1':
            firstTokenCalls += 1;
            return firstTokenCalls === 1 ? lateFirst.promise : INVALID_SESSION;
          case 'Bearer token-2':
            return INVALID_SESSION;
          default:
            return json(200, contactRecord);
        }
      };

      // held on its token-1 response
      const slow = client.getContact(CONTACT_ID);
      await vi.waitFor(() => expect(firstTokenCalls).toBe(1));

      // refreshes to token-2, which is refused as well
      await expect(client.getContact(CONTACT_ID)).rejects.toBeInstanceOf(AuthError);

      // starts the third exchange, held open
      const third = client.getContact(CONTACT_ID);
      await vi.waitFor(() => expect(transport.tokenRequests).toHaveLength(3));

      lateFirst.resolve(INVALID_SESSION);
      await new Promise((resolve) => setImmediate(resolve));
      heldExchange.resolve(json(200, { access_token: 'token-3' }));

      await expect(slow).resolves.toEqual(contactRecord);
      await expect(third).resolves.toEqual(contactRecord);
      expect(transport.tokenRequests).toHaveLength(3);
      expect(transport.bearerTokens).toEqual([
        'token-1',
        'token-1',
        'token-2',
        'token-2',
        'token-3',
        'token-3',
      ]);
    });
  });

  describe('instance URL', () => {
    it('sends record calls to the instance_url issued with the token', async () => {
      transport.tokenHandler = () =>
        json(200, { access_token: 'token-moved', instance_url: 'https://moved.my.salesforce.com' });
      transport.recordHandler = () => json(200, contactRecord);

      await client.getContact(CONTACT_ID);

      expect(transport.recordRequests[0].url).toBe(
        `https://moved.my.salesforce.com/services/data/v60.0/sobjects/Contact/${CONTACT_ID}`,
      );
    });
  });

  describe('execute', () => {
    it('dispatches each operation kind to its result kind', async () => {
      transport.recordHandler = (request) => {
        if (request.method === 'POST') return json(201, { id: CONTACT_ID, success: true, errors: [] });
        if (request.method === 'PATCH' || request.method === 'DELETE') return noContent();
        if (request.url.includes('/query')) return queryPage([{ Id: CONTACT_ID }]);
        return json(200, contactRecord);
      };

      await expect(
        client.execute({ kind: 'create', recordType: 'Contact', fields: { LastName: 'Doe' } }),
      ).resolves.toEqual({ kind: 'created', record: { id: CONTACT_ID, fields: { success: true } } });
      await expect(client.execute({ kind: 'get', recordType: 'Contact', id: CONTACT_ID })).resolves.toEqual({
        kind: 'record',
        record: contactRecord,
      });
      await expect(
        client.execute({ kind: 'update', recordType: 'Event', id: EVENT_ID, fields: { Subject: 'x' } }),
      ).resolves.toEqual({ kind: 'updated', id: EVENT_ID });
      await expect(client.execute({ kind: 'delete', recordType: 'Event', id: EVENT_ID })).resolves.toEqual({
        kind: 'deleted',
        id: EVENT_ID,
      });
      await expect(
        client.execute({ kind: 'list', recordType: 'Contact', constraints: { limit: 1 } }),
      ).resolves.toEqual({ kind: 'list', result: { totalSize: 1, records: [{ Id: CONTACT_ID }] } });
      await expect(client.execute({ kind: 'query', soql: 'SELECT Id FROM Contact' })).resolves.toEqual({
        kind: 'query',
        result: { totalSize: 1, done: true, records: [{ Id: CONTACT_ID }] },
      });

      expect(transport.tokenRequests).toHaveLength(1);
    });
  });
});
