export class InvalidStepConfigError extends Error {
    constructor(
        public stepNumber: number,
        public stepType: string,
        public issues: string[]
    ) {
        super(`Invalid config for step ${stepNumber} (${stepType}): ${issues.join('; ')}`);
        this.name = 'InvalidStepConfigError';
    }
}
