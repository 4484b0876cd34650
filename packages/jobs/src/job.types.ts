export type JobState = 'PENDING' | 'SUCCESS' | 'FAILURE';

export type TerminalState = Exclude<JobState, 'PENDING'>;

/** Named numeric statistics produced by a successful task. */
export type JobValue = Record<string, number>;

export type TaskOutcome =
  | { kind: 'success'; value: JobValue }
  | { kind: 'failure'; message: string };

export type JobRecord =
  | { id: string; state: 'PENDING'; result: null }
  | { id: string; state: 'SUCCESS'; result: JobValue }
  | { id: string; state: 'FAILURE'; result: string };

export type TerminalRecord = Exclude<JobRecord, { state: 'PENDING' }>;

/** What travels through the broker for one job. */
export type JobSpec = {
  jobId: string;
  taskName: string;
  payload: string;
};

export type SettleResult = {
  /** false when another settlement already won */
  applied: boolean;
  record: TerminalRecord;
};

export function success(value: JobValue): TaskOutcome {
  return { kind: 'success', value };
}

export function failure(message: string): TaskOutcome {
  return { kind: 'failure', message };
}

export function pendingRecord(id: string): JobRecord {
  return { id, state: 'PENDING', result: null };
}

export function terminalRecord(id: string, outcome: TaskOutcome): TerminalRecord {
  return outcome.kind === 'success'
    ? { id, state: 'SUCCESS', result: outcome.value }
    : { id, state: 'FAILURE', result: outcome.message };
}

const JOB_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export function isValidJobId(id: string): boolean {
  return JOB_ID_PATTERN.test(id);
}
