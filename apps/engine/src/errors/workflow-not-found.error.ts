export class WorkflowNotFoundError extends Error {
    constructor(public workflowId: string) {
        super(`Workflow ${workflowId} not found`);
        this.name = 'WorkflowNotFoundError';
    }
}
