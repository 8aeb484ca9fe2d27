export interface RecordingSession {
  readonly id: string;
  readonly active: boolean;
  readonly startedAt: Date;
  readonly endedAt?: Date;
  readonly note: string;
}

export interface NewRecordingSession {
  readonly startedAt: Date;
  readonly note: string;
}
