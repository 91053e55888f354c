import { RUN_ABANDONED, executeCoordinator } from './Coordinator';
import {
  ConsumerOperationParam,
  ConsumerSpec,
  CoordinatorExecutionContext,
  ProducerOperationParam,
  ProducerSpec,
  WorkflowInputs,
} from './Coordinator/types';
import { GuardedTask } from './GuardedTask';
import { GuardedOperation, GuardedTaskParam, TaskAdmission } from './GuardedTask/types';
import { RESUME_WORKFLOW_NAME, ResumeTask, buildResumeComposeInput, createResumeWorkflow, runResumeWorkflow } from './ResumeWorkflow';
import { resumeWorkflowInputSchema, splitResumeRequest, summarizeProvidedInputs } from './ResumeWorkflow/inputs';
import { normalizeKeywords } from './ResumeWorkflow/keywords';
import {
  CreateResumeWorkflowParam,
  ResumeComposeContext,
  ResumeComposeInput,
  ResumeExtraKey,
  ResumeInputKey,
  ResumeProducerId,
  ResumeSource,
  ResumeWorkflowOperations,
  ResumeWorkflowRequest,
} from './ResumeWorkflow/types';
import { RunState } from './RunState';
import { IRunState } from './RunState/types';
import {
  NO_INPUT_PROVIDED,
  TaskFailure,
  TaskIdentifier,
  TaskOutcome,
  TaskOutcomeStatus,
  TaskSuccess,
  WorkflowOutcome,
  WorkflowTimeout,
  failure,
  isFailure,
  isSuccess,
  isTimeout,
  success,
  timeout,
} from './TaskOutcome';
import { WorkflowOrchestrator } from './WorkflowOrchestrator';
import { MAX_DEADLINE_MS, runWithDeadline } from './WorkflowOrchestrator/deadline';
import { DEFAULT_WORKFLOW_TIMEOUT_MS, createWorkflowOrchestrator } from './WorkflowOrchestrator/factory';
import {
  CreateWorkflowOrchestratorParam,
  RunWorkflowOptions,
  RunWorkflowParam,
  WorkflowInputSchema,
  WorkflowOrchestratorParam,
  WorkflowRunResult,
} from './WorkflowOrchestrator/types';
import {
  ConfigViolation,
  ContractViolation,
  InvariantViolation,
  WorkflowViolationType,
  isConfigViolation,
  isContractViolation,
  isInvariantViolation,
  isWorkflowViolation,
} from './errors';
import { WorkflowOtelSpanOptions } from './types';
import { getValueOrDefault, isNullOrUndefined } from './utils';

export {
  TaskOutcomeStatus,
  NO_INPUT_PROVIDED,
  TaskIdentifier,
  TaskSuccess,
  TaskFailure,
  TaskOutcome,
  WorkflowTimeout,
  WorkflowOutcome,
  success,
  failure,
  timeout,
  isSuccess,
  isFailure,
  isTimeout,
  IRunState,
  RunState,
  GuardedTask,
  GuardedTaskParam,
  GuardedOperation,
  TaskAdmission,
  executeCoordinator,
  RUN_ABANDONED,
  CoordinatorExecutionContext,
  ProducerSpec,
  ProducerOperationParam,
  ConsumerSpec,
  ConsumerOperationParam,
  WorkflowInputs,
  WorkflowOrchestrator,
  createWorkflowOrchestrator,
  DEFAULT_WORKFLOW_TIMEOUT_MS,
  runWithDeadline,
  MAX_DEADLINE_MS,
  WorkflowOrchestratorParam,
  CreateWorkflowOrchestratorParam,
  WorkflowInputSchema,
  RunWorkflowParam,
  RunWorkflowOptions,
  WorkflowRunResult,
  RESUME_WORKFLOW_NAME,
  ResumeTask,
  createResumeWorkflow,
  runResumeWorkflow,
  buildResumeComposeInput,
  normalizeKeywords,
  resumeWorkflowInputSchema,
  splitResumeRequest,
  summarizeProvidedInputs,
  ResumeProducerId,
  ResumeInputKey,
  ResumeExtraKey,
  ResumeWorkflowRequest,
  ResumeSource,
  ResumeComposeInput,
  ResumeComposeContext,
  ResumeWorkflowOperations,
  CreateResumeWorkflowParam,
  InvariantViolation,
  ConfigViolation,
  ContractViolation,
  isInvariantViolation,
  isConfigViolation,
  isContractViolation,
  isWorkflowViolation,
  WorkflowViolationType,
  WorkflowOtelSpanOptions,
  isNullOrUndefined,
  getValueOrDefault,
};
