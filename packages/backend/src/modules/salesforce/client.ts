import { FetchTransport, type HttpTransport } from './http-transport';
import { RecordClient } from './record-client';
import type { Credentials } from './salesforce.types';
import { TokenProvider } from './token-provider';

export interface SalesforceConfig extends Credentials {
  loginUrl: string;
  timeoutMs: number;
  /** Overrides the fetch transport; tests pass an in-process fake. */
  transport?: HttpTransport;
}

/**
 * Wires transport, token provider and record client for one connected app.
 * Call once at application startup; the returned client is safe to share.
 */
export function createSalesforceClient(config: SalesforceConfig): RecordClient {
  const credentials: Credentials = Object.freeze({
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    refreshToken: config.refreshToken,
    instanceUrl: config.instanceUrl.replace(/\/+$/, ''),
    apiVersion: config.apiVersion,
  });

  const transport = config.transport ?? new FetchTransport(config.timeoutMs);
  const tokens = new TokenProvider({ credentials, transport, loginUrl: config.loginUrl });

  return new RecordClient({ credentials, tokens, transport });
}
