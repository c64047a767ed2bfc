export { WorkflowNotFoundError } from './workflow-not-found.error';
export { TemplateInputError } from './template-input.error';
export { InvalidStepConfigError } from './invalid-step-config.error';
export { InvalidRequestError } from './invalid-request.error';
