import { TaskEvent, TaskStatus } from '../types/index.js';

/**
 * State transition table.
 * Maps (current state, event) -> next state
 */
export const TASK_TRANSITIONS: Record<TaskStatus, Partial<Record<TaskEvent, TaskStatus>>> = {
  [TaskStatus.PENDING]: {
    [TaskEvent.LAUNCH_ACK]: TaskStatus.RUNNING,
    [TaskEvent.LAUNCH_FAILED]: TaskStatus.FAILED,
  },
  [TaskStatus.RUNNING]: {
    [TaskEvent.STOP_REQUESTED]: TaskStatus.STOPPING,
    [TaskEvent.JOB_COMPLETED]: TaskStatus.COMPLETED,
    [TaskEvent.JOB_FAILED]: TaskStatus.FAILED,
  },
  // Terminal signals that arrive while stopping are ignored by the registry
  [TaskStatus.STOPPING]: {
    [TaskEvent.RUNTIME_TORN_DOWN]: TaskStatus.STOPPED,
  },
  // Terminal states - no transitions out
  [TaskStatus.COMPLETED]: {},
  [TaskStatus.FAILED]: {},
  [TaskStatus.STOPPED]: {},
};

export const TERMINAL_STATES: readonly TaskStatus[] = [
  TaskStatus.COMPLETED,
  TaskStatus.FAILED,
  TaskStatus.STOPPED,
];

/**
 * Check if a state is terminal (no more transitions possible).
 */
export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_STATES.includes(status);
}

/**
 * Stop-in-progress or finalized stop. Completion and failure signals are
 * discarded in these states.
 */
export function isStopStatus(status: TaskStatus): boolean {
  return status === TaskStatus.STOPPING || status === TaskStatus.STOPPED;
}

/**
 * Get the next state for a given transition.
 * Returns null if the transition is invalid.
 */
export function getNextStatus(current: TaskStatus, event: TaskEvent): TaskStatus | null {
  return TASK_TRANSITIONS[current][event] ?? null;
}

export function canTransition(current: TaskStatus, event: TaskEvent): boolean {
  return getNextStatus(current, event) !== null;
}

export function getValidEvents(current: TaskStatus): TaskEvent[] {
  return Object.values(TaskEvent).filter((event) => event in TASK_TRANSITIONS[current]);
}
