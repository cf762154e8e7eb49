import { QueryResult, describeFault, fault } from './QueryResult';

/**
 * Capability that answers one prompt with one complete response.
 */
export interface QueryClient {
  query(prompt: string): Promise<QueryResult>;
}

/**
 * Build a client and query it once. Never rejects: construction errors,
 * thrown errors and rejections all come back as a fault.
 */
export async function settleQuery(connect: () => QueryClient, prompt: string): Promise<QueryResult> {
  try {
    const client = connect();
    return await client.query(prompt);
  } catch (error: unknown) {
    return fault(describeFault(error));
  }
}
