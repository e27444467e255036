import { FailureRecord, TenantOutcome } from '../reminder/reminder.types';

export interface RunResult {
    successCount: number;
    failureCount: number;
    failures: FailureRecord[];
}

export function emptyRunResult(): RunResult {
    return { successCount: 0, failureCount: 0, failures: [] };
}

export function recordOutcome(result: RunResult, outcome: TenantOutcome): RunResult {
    if (outcome.status === 'sent') {
        return { ...result, successCount: result.successCount + 1 };
    }
    return {
        successCount: result.successCount,
        failureCount: result.failureCount + 1,
        failures: [...result.failures, outcome.failure],
    };
}
