import type { BulkOperation } from '../types/salesforce.js';
import { BulkOperationError } from './errorHandler.js';

export enum BulkJobState {
  Created = 'Created',
  Open = 'Open',
  UploadComplete = 'UploadComplete',
  InProgress = 'InProgress',
  JobComplete = 'JobComplete',
  Failed = 'Failed',
  Aborted = 'Aborted',
}

// Polls may report the same state more than once while the job is processing
const TRANSITIONS = {
  [BulkJobState.Created]: [BulkJobState.Open],
  [BulkJobState.Open]: [BulkJobState.UploadComplete, BulkJobState.Failed, BulkJobState.Aborted],
  [BulkJobState.UploadComplete]: [
    BulkJobState.UploadComplete,
    BulkJobState.InProgress,
    BulkJobState.JobComplete,
    BulkJobState.Failed,
    BulkJobState.Aborted,
  ],
  [BulkJobState.InProgress]: [
    BulkJobState.InProgress,
    BulkJobState.JobComplete,
    BulkJobState.Failed,
    BulkJobState.Aborted,
  ],
  [BulkJobState.JobComplete]: [],
  [BulkJobState.Failed]: [],
  [BulkJobState.Aborted]: [],
} satisfies Record<BulkJobState, readonly BulkJobState[]>;

const STATES: ReadonlySet<string> = new Set(Object.values(BulkJobState));

function isBulkJobState(value: string): value is BulkJobState {
  return STATES.has(value);
}

export function isTerminal(state: BulkJobState): boolean {
  return TRANSITIONS[state].length === 0;
}

/**
 * Local view of one Bulk API 2.0 ingest job. Every state change goes through
 * transition(), which rejects moves the job lifecycle does not allow.
 */
export class BulkJob {
  private _id?: string;
  private _state = BulkJobState.Created;

  constructor(readonly object: string, readonly operation: BulkOperation) {}

  get id(): string | undefined {
    return this._id;
  }

  get state(): BulkJobState {
    return this._state;
  }

  /** Record the remote job id once the job has been created */
  open(id: string): void {
    this.transition(BulkJobState.Open);
    this._id = id;
  }

  /**
   * Apply a state reported by Salesforce or requested by the orchestrator
   */
  transition(next: BulkJobState | string): void {
    if (!isBulkJobState(next)) {
      throw new BulkOperationError(`Bulk job reported unknown state "${next}"`, 'invalid_transition', this._id);
    }
    const allowed: readonly BulkJobState[] = TRANSITIONS[this._state];
    if (!allowed.includes(next)) {
      throw new BulkOperationError(
        `Bulk job cannot move from ${this._state} to ${next}`,
        'invalid_transition',
        this._id
      );
    }
    this._state = next;
  }
}
