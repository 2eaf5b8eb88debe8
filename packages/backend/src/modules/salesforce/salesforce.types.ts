/** Connected-app credentials. Built once at startup and never mutated. */
export interface Credentials {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly refreshToken: string;
  readonly instanceUrl: string;
  readonly apiVersion: string;
}

/** A bearer token minted by the refresh exchange. No expiry is tracked. */
export interface AccessToken {
  readonly value: string;
  readonly acquiredAt: Date;
  /** Instance URL advertised by the token endpoint, when it sent one. */
  readonly instanceUrl?: string;
}

export type RecordType = 'Contact' | 'Event';

export type FieldValue = string | number | boolean | null;

/** Business fields passed through to Salesforce without interpretation. */
export type RecordFields = Record<string, FieldValue>;

/** A record as Salesforce returned it, `attributes` included. */
export type RemoteRecord = Record<string, unknown>;

export interface ListConstraints {
  limit?: number;
  /** Field → value equality clauses, combined with AND. */
  filter?: RecordFields;
}

// === Operation requests ===

export type OperationRequest =
  | { kind: 'create'; recordType: RecordType; fields: RecordFields }
  | { kind: 'get'; recordType: RecordType; id: string }
  | { kind: 'update'; recordType: RecordType; id: string; fields: RecordFields }
  | { kind: 'delete'; recordType: RecordType; id: string }
  | { kind: 'list'; recordType: RecordType; constraints: ListConstraints }
  | { kind: 'query'; soql: string };

export type OperationKind = OperationRequest['kind'];

// === Operation results ===

export interface CreatedRecord {
  id: string;
  /** Scalar fields the remote echoed alongside the id. */
  fields: RecordFields;
}

export interface RecordList {
  totalSize: number;
  records: RemoteRecord[];
}

export interface QueryResult extends RecordList {
  done: boolean;
  nextRecordsUrl?: string;
}

export type OperationResult =
  | { kind: 'created'; record: CreatedRecord }
  | { kind: 'record'; record: RemoteRecord }
  | { kind: 'updated'; id: string }
  | { kind: 'deleted'; id: string }
  | { kind: 'list'; result: RecordList }
  | { kind: 'query'; result: QueryResult };
