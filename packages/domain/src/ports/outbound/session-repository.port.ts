import type { NewRecordingSession, RecordingSession } from '../../entities/recording-session.js';

export interface SessionRepositoryPort {
  /**
   * Deactivates every active session (stamping `endedAt`) and inserts a new
   * active one. Implementations run both steps as one unit.
   */
  replaceActive(session: NewRecordingSession): Promise<RecordingSession>;
  /** Returns the number of sessions that were closed. */
  deactivateAll(endedAt: Date): Promise<number>;
  findActive(): Promise<RecordingSession | null>;
}
