import type { Span } from '@opentelemetry/api';
import type { ProducerOperationParam } from '../Coordinator/types';

export type ResumeProducerId = 'repo-fetch' | 'page-scrape' | 'keyword-extract';

export type ResumeInputKey = 'githubUrl' | 'portfolioUrl' | 'jobDescription';

export type ResumeExtraKey = 'oldResumeText' | 'userFeedback' | 'userAdditions';

/**
 * Flat request accepted by {@link runResumeWorkflow}. Every field is optional;
 * producers whose input is missing are skipped.
 */
export type ResumeWorkflowRequest = Partial<Record<ResumeInputKey | ResumeExtraKey, string | null>>;

/**
 * A producer result as the compose operation sees it. Unavailable sources
 * carry the reason, so the composed document can say what is missing rather
 * than silently working from empty text.
 */
export type ResumeSource = { available: true; content: string } | { available: false; reason: string };

export type ResumeComposeInput = {
  githubData: ResumeSource;
  portfolioData: ResumeSource;
  /** Raw keyword extraction result */
  jdKeywordsSource: ResumeSource;
  /** Normalised keywords, empty when the extraction was unavailable */
  jdKeywords: string[];
  oldResumeText: string;
  userAdditions: string;
  userFeedback: string;
};

export type ResumeComposeContext = {
  runId: string;
  signal: AbortSignal;
  span: Span;
};

/**
 * Integrations backing the resume workflow. Each resolves with an opaque
 * string payload (JSON or plain text) and may throw on failure.
 */
export type ResumeWorkflowOperations = {
  /** Repository metadata for a GitHub profile URL */
  fetchRepositories: (param: ProducerOperationParam) => Promise<string>;
  /** Visible text of a portfolio page */
  scrapePortfolio: (param: ProducerOperationParam) => Promise<string>;
  /** Keywords of a job description, comma or newline separated */
  extractKeywords: (param: ProducerOperationParam) => Promise<string>;
  /** The structured resume document */
  compose: (input: ResumeComposeInput, context: ResumeComposeContext) => Promise<string>;
};

export type CreateResumeWorkflowParam = {
  operations: ResumeWorkflowOperations;
  timeoutMs?: number;
};
