import { STEP_TYPE, StepType } from '@proactive/sdk';
import { WorkflowEntity, workflowStatus } from '../../src/db/workflow.entity';
import { WorkflowStepEntity, stepStatus } from '../../src/db/workflow_step.entity';
import type { LockClient } from '../../src/services/leaderelector';

export const NOW = new Date('2024-07-01T09:00:00.000Z');
export const HOUR_MS = 60 * 60 * 1000;

export function makeWorkflow(overrides: Partial<WorkflowEntity> = {}): WorkflowEntity {
    return {
        id: 'wf_test',
        user_id: 'user-1',
        workflow_type: 'generic',
        name: 'Test workflow',
        description: null,
        status: workflowStatus.RUNNING,
        input_data: { user_request: 'Schedule a meeting' },
        context: {},
        timeout_at: null,
        retry_count: 0,
        max_retries: 2,
        error_message: null,
        runner_id: 'pass-1',
        heartbeat_at: NOW,
        created_at: NOW,
        updated_at: NOW,
        completed_at: null,
        ...overrides,
    };
}

export function makeStep(
    stepType: StepType,
    config: unknown,
    overrides: Partial<WorkflowStepEntity> = {},
): WorkflowStepEntity {
    return {
        id: 'step-1',
        workflow_id: 'wf_test',
        step_number: 1,
        name: 'Step',
        step_type: stepType,
        config,
        status: stepStatus.RUNNING,
        output_data: null,
        error_message: null,
        started_at: NOW,
        completed_at: null,
        ...overrides,
    };
}

export function completedStep(stepNumber: number, name: string, output: unknown): WorkflowStepEntity {
    return makeStep(STEP_TYPE.TOOL_CALL, {}, {
        id: `step-${stepNumber}`,
        step_number: stepNumber,
        name,
        status: stepStatus.COMPLETED,
        output_data: output,
        completed_at: NOW,
    });
}

/** Single-node Redis lock semantics: SET NX, GET, and the two compare-and-* scripts. */
export class FakeLock implements LockClient {
    readonly values = new Map<string, string>();
    readonly ttls = new Map<string, number>();

    async set(key: string, value: string, _mode: 'EX', ttl: number, _nx: 'NX'): Promise<'OK' | null> {
        if (this.values.has(key)) return null;
        this.values.set(key, value);
        this.ttls.set(key, ttl);
        return 'OK';
    }

    async get(key: string): Promise<string | null> {
        return this.values.get(key) ?? null;
    }

    async eval(script: string, _numkeys: number, ...args: (string | number)[]): Promise<unknown> {
        const [key, owner, ttl] = args;
        if (typeof key !== 'string' || this.values.get(key) !== owner) return 0;
        if (script.includes('"del"')) {
            this.values.delete(key);
            this.ttls.delete(key);
        } else if (typeof ttl === 'number') {
            this.ttls.set(key, ttl);
        }
        return 1;
    }
}
