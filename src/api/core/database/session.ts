import { RequestAbortedError, StoreUnavailableError } from "../errors/app-error";
import { isConnectivityError, toStoreError } from "./store-errors";

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RequestAbortedError();
  }
}

/**
 * The part of pg's Pool / PoolClient a session needs.
 */
export interface SessionClient {
  query(text: string, values?: unknown[]): Promise<unknown>;
  release(destroy?: boolean): void;
}

export interface SessionPool<C extends SessionClient> {
  connect(): Promise<C>;
}

/**
 * Runs `work` inside a READ ONLY transaction on a client checked out for
 * this call alone. The client goes back to the pool on every path; it is
 * destroyed instead when the connection can no longer be trusted
 * (connectivity failure, failed rollback, aborted request).
 */
export async function withReadOnlySession<C extends SessionClient, T>(
  pool: SessionPool<C>,
  work: (client: C) => Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  throwIfAborted(signal);

  let client: C;
  try {
    client = await pool.connect();
  } catch (err) {
    throw new StoreUnavailableError("Could not connect to the catalog store", err);
  }

  let destroy = false;
  try {
    await client.query("BEGIN READ ONLY");
    const result = await work(client);
    throwIfAborted(signal);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    destroy = err instanceof RequestAbortedError || isConnectivityError(err);
    if (!destroy) {
      try {
        await client.query("ROLLBACK");
      } catch {
        destroy = true;
      }
    }
    throw toStoreError(err);
  } finally {
    client.release(destroy);
  }
}
