/**
 * One live connection to the backing key-value store.
 *
 * Implementations report transport faults by rejecting; the StoreClient turns
 * whatever they throw into a StoreError.
 */
export interface StoreConnection {
  /** Value bytes, or null when the key is absent or expired */
  get(key: string): Promise<Uint8Array | null>;
  /** Write with a store-enforced expiry */
  set(key: string, value: Uint8Array, ttlMs: number): Promise<void>;
  /** Whether a key was removed */
  delete(key: string): Promise<boolean>;
  ping(): Promise<void>;
  /** Shut down; `force` drops the transport without waiting on queued commands */
  close(force?: boolean): Promise<void>;
  /** False once the underlying transport is gone */
  readonly isOpen: boolean;
}

export type StoreOperation = "get" | "set" | "delete" | "ping";
