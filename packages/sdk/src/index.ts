// public api for @proactive/sdk
// usage:
//   import { STEP_TYPE, stepDescriptorSchema, type DecisionEngine } from '@proactive/sdk';

export {
    STEP_TYPE,
    FIXED_TOOL,
    captureSchema,
    conditionSchema,
    toolCallConfigSchema,
    aiDecisionConfigSchema,
    waitForResponseConfigSchema,
    sendEmailConfigSchema,
    scheduleMeetingConfigSchema,
    stepDescriptorSchema,
    isStepType,
    parseStepConfig,
} from './steps';
export type {
    StepType,
    Capture,
    Condition,
    ToolCallConfig,
    AiDecisionConfig,
    WaitForResponseConfig,
    SendEmailConfig,
    ScheduleMeetingConfig,
    StepDescriptor,
    StepDescriptorInput,
    StepConfigOf,
    TypedStepConfig,
} from './steps';
export type {
    ToolDefinition,
    ToolResult,
    ToolExecutionService,
    ToolCallRequest,
    ExecutedToolCall,
    ConversationMessage,
    Decision,
    DecisionEngine,
    RetrievedContext,
    ContextRetrieval,
    ReminderRequest,
    ReminderOutcome,
    ReminderDispatch,
} from './collaborators';
export { serialize, deserialize, toColumn, fromColumn, SerializationError } from './utils/serialization';
