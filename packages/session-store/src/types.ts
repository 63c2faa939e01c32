import type { SessionSnapshot } from '@price-sentinel/contracts';

/**
 * Persistence for tracker snapshots.
 */
export interface SessionStore {
  /** Where snapshots live, for logs and the status command */
  readonly filePath: string;

  /** Rejects with a PersistenceError; the previous snapshot survives a failed save */
  save(snapshot: SessionSnapshot): Promise<void>;

  /** Resolves null when there is nothing usable to resume from */
  load(): Promise<SessionSnapshot | null>;
}
