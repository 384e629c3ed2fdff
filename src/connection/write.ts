import { WriteError, toError } from '../errors.ts';
import type { ConnectionHandle } from '../transports/ConnectionTransport.ts';

export type WriteResult = { ok: true } | { ok: false; error: WriteError };

/**
 * Write one payload, turning a rejected write into a result value.
 */
export async function writePayload(handle: ConnectionHandle, payload: string): Promise<WriteResult> {
  if (!handle.open) {
    return { ok: false, error: new WriteError('Connection is not open') };
  }
  try {
    await handle.write(payload);
    return { ok: true };
  } catch (err) {
    const error = err instanceof WriteError ? err : new WriteError(toError(err).message, err);
    return { ok: false, error };
  }
}
