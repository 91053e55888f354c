import { logToSpan } from 'arvo-core';
import type { RunWorkflowOptions, WorkflowRunResult } from '../WorkflowOrchestrator/types';
import type { WorkflowOrchestrator } from '../WorkflowOrchestrator';
import { createWorkflowOrchestrator } from '../WorkflowOrchestrator/factory';
import { NO_INPUT_PROVIDED, type TaskOutcome } from '../TaskOutcome';
import { resumeWorkflowInputSchema, splitResumeRequest, summarizeProvidedInputs } from './inputs';
import { normalizeKeywords } from './keywords';
import type {
  CreateResumeWorkflowParam,
  ResumeComposeInput,
  ResumeInputKey,
  ResumeProducerId,
  ResumeSource,
  ResumeWorkflowRequest,
} from './types';

export const RESUME_WORKFLOW_NAME = 'resume.generation';

export const ResumeTask = {
  REPO_FETCH: 'repo-fetch',
  PAGE_SCRAPE: 'page-scrape',
  KEYWORD_EXTRACT: 'keyword-extract',
  COMPOSE: 'compose',
} as const;

const toResumeSource = (outcome: TaskOutcome | undefined): ResumeSource =>
  outcome?.status === 'success'
    ? { available: true, content: outcome.payload }
    : { available: false, reason: outcome?.message ?? NO_INPUT_PROVIDED };

/**
 * Turns the joined producer outcomes into the compose operation's input.
 * Failed or skipped producers stay visible as unavailable sources.
 */
export const buildResumeComposeInput = (
  outcomes: ReadonlyMap<ResumeProducerId, TaskOutcome>,
  extras: Readonly<Record<string, string>>,
): ResumeComposeInput => {
  const jdKeywordsSource = toResumeSource(outcomes.get(ResumeTask.KEYWORD_EXTRACT));
  return {
    githubData: toResumeSource(outcomes.get(ResumeTask.REPO_FETCH)),
    portfolioData: toResumeSource(outcomes.get(ResumeTask.PAGE_SCRAPE)),
    jdKeywordsSource,
    jdKeywords: jdKeywordsSource.available ? normalizeKeywords(jdKeywordsSource.content) : [],
    oldResumeText: extras.oldResumeText ?? '',
    userAdditions: extras.userAdditions ?? '',
    userFeedback: extras.userFeedback ?? '',
  };
};

/**
 * Creates the resume generation workflow: repository fetch, portfolio scrape
 * and keyword extraction fan out, and their joined results feed the compose step.
 */
export const createResumeWorkflow = ({
  operations,
  timeoutMs,
}: CreateResumeWorkflowParam): WorkflowOrchestrator<ResumeProducerId, ResumeInputKey> =>
  createWorkflowOrchestrator<ResumeProducerId, ResumeInputKey>({
    name: RESUME_WORKFLOW_NAME,
    timeoutMs,
    inputSchema: resumeWorkflowInputSchema,
    producers: [
      { id: ResumeTask.REPO_FETCH, inputKey: 'githubUrl', operation: operations.fetchRepositories },
      { id: ResumeTask.PAGE_SCRAPE, inputKey: 'portfolioUrl', operation: operations.scrapePortfolio },
      { id: ResumeTask.KEYWORD_EXTRACT, inputKey: 'jobDescription', operation: operations.extractKeywords },
    ],
    consumer: {
      id: ResumeTask.COMPOSE,
      operation: ({ outcomes, extras, runId, signal, span }) =>
        operations.compose(buildResumeComposeInput(outcomes, extras), { runId, signal, span }),
    },
  });

/**
 * Runs the resume workflow for a flat request, logging which inputs were provided.
 */
export const runResumeWorkflow = async (
  orchestrator: WorkflowOrchestrator<ResumeProducerId, ResumeInputKey>,
  request: ResumeWorkflowRequest,
  options?: RunWorkflowOptions,
): Promise<WorkflowRunResult> => {
  const provided = summarizeProvidedInputs(request);
  logToSpan({
    level: 'INFO',
    message: `Resume generation requested with: ${provided.length ? provided.join(', ') : 'None provided'}`,
  });
  return await orchestrator.runWorkflow(splitResumeRequest(request), options);
};
