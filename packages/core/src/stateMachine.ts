/**
 * Download State Machine
 *
 * Strict state machine for one download's lifecycle.
 *
 * State Flow:
 * REQUESTED → FETCHING → POSTPROCESSING → RESOLVING_OUTPUT → TAGGING → COMPLETE
 *          ↘ FAILED (from any non-terminal state)
 *
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - COMPLETE and FAILED are terminal
 */

import { StateTransitionError, type FailureKind } from './errors/index.js';

export const DOWNLOAD_STATES = [
  'REQUESTED',
  'FETCHING',
  'POSTPROCESSING',
  'RESOLVING_OUTPUT',
  'TAGGING',
  'COMPLETE',
  'FAILED',
] as const;

export type DownloadState = typeof DOWNLOAD_STATES[number];

/**
 * Represents a state transition with metadata
 */
export interface DownloadStateTransition {
  from: DownloadState;
  to: DownloadState;
  timestamp: Date;
  reason?: string;
  failureKind?: FailureKind;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<DownloadState, ReadonlySet<DownloadState>> = {
  REQUESTED: new Set<DownloadState>(['FETCHING', 'FAILED']),
  FETCHING: new Set<DownloadState>(['POSTPROCESSING', 'FAILED']),
  POSTPROCESSING: new Set<DownloadState>(['RESOLVING_OUTPUT', 'FAILED']),
  RESOLVING_OUTPUT: new Set<DownloadState>(['TAGGING', 'FAILED']),
  TAGGING: new Set<DownloadState>(['COMPLETE', 'FAILED']),
  COMPLETE: new Set<DownloadState>(),
  FAILED: new Set<DownloadState>(),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: DownloadState, to: DownloadState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: DownloadState): DownloadState[] {
  return Array.from(validTransitions[current]);
}

export type TransitionListener = (transition: DownloadStateTransition) => void;

/**
 * Download State Machine class
 * Manages state transitions with validation and notifies a listener on each one
 */
export class DownloadStateMachine {
  private currentState: DownloadState;
  private history: DownloadStateTransition[];
  private readonly downloadId: string;
  private readonly listener?: TransitionListener;

  constructor(downloadId: string, listener?: TransitionListener) {
    this.downloadId = downloadId;
    this.currentState = 'REQUESTED';
    this.history = [];
    this.listener = listener;
  }

  getState(): DownloadState {
    return this.currentState;
  }

  getHistory(): ReadonlyArray<DownloadStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: DownloadState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(
    targetState: DownloadState,
    reason?: string,
    failureKind?: FailureKind
  ): DownloadStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.downloadId, this.currentState, targetState);
    }

    const transition: DownloadStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
      failureKind,
    };

    this.history.push(transition);
    this.currentState = targetState;
    this.listener?.(transition);

    return transition;
  }

  isTerminal(): boolean {
    return this.currentState === 'COMPLETE' || this.currentState === 'FAILED';
  }

  hasFailed(): boolean {
    return this.currentState === 'FAILED';
  }

  /**
   * Fail the download with a reason. A no-op once terminal.
   */
  fail(reason: string, failureKind: FailureKind): DownloadStateTransition | null {
    if (this.isTerminal()) {
      return null;
    }
    return this.transitionTo('FAILED', reason, failureKind);
  }
}
