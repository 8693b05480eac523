/**
 * Thread state types for the intake conversation
 */

export const INTAKE_STATES = [
  'init',
  'waiting_task_details',
  'waiting_edit',
  'waiting_delete',
  'approved',
  'ignored_existing'
] as const;

export type IntakeState = typeof INTAKE_STATES[number];

export const TERMINAL_STATES: ReadonlySet<IntakeState> = new Set<IntakeState>(['approved', 'ignored_existing']);

export interface ThreadState {
  threadId: string;
  state: IntakeState;
  taskReference?: string;     // Notion page URL, set once per thread
  errorCount: number;         // consecutive failed create_task attempts
  updatedAt?: string;         // ISO timestamp, absent for never-persisted threads
  extra: Record<string, unknown>; // unknown persisted fields, written back untouched
}

export interface ThreadStateUpdate {
  state?: IntakeState;
  taskReference?: string;
  errorCount?: number;
}

/**
 * Sole owner of persisted thread state
 */
export interface ThreadStateStore {
  getThreadState(threadId: string): Promise<ThreadState>;
  updateThreadState(threadId: string, update: ThreadStateUpdate): Promise<ThreadState>;
  clearThreadState(threadId: string): Promise<void>;
}
