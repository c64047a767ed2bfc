export class TemplateInputError extends Error {
    constructor(
        public workflowType: string,
        public issues: string[]
    ) {
        super(`Invalid input for ${workflowType}: ${issues.join('; ')}`);
        this.name = 'TemplateInputError';
    }
}
