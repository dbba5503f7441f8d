import type { AuthMode } from './Site'
import type { TokenRecord } from './Token'
import type { ErrorKind } from '../util/Errors'

export type WorkflowState = 'Idle' | 'Authenticating' | 'Authenticated' | 'CheckingIn' | 'Done' | 'Aborted'

export type CheckinStatus = 'checked-in' | 'already-checked-in' | 'unconfirmed' | 'failed' | 'skipped'

export interface AccountResult {
    accountKey: string;
    label: string;
    username: string;
    site: string;
    baseUrl: string;
    authMode: AuthMode;
    success: boolean;
    userId?: number;
    quotaRemaining: number;
    quotaBefore?: number;
    quotaDelta: number;
    tokens: TokenRecord[];
    state: WorkflowState;
    checkin: CheckinStatus;
    message: string;
    errorKind?: ErrorKind;
    /** 1-based attempt number for this account key */
    attempt: number;
    durationMs: number;
    finishedAt: string;
}

export interface RunSummary {
    runId: string;
    total: number;
    succeeded: number;
    failed: number;
    failedLabels: string[];
    quotaGained: number;
}
