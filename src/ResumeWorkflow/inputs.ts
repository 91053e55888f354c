import { z } from 'zod';
import { isNullOrUndefined, resolveInput } from '../utils';
import type { ResumeExtraKey, ResumeInputKey, ResumeWorkflowRequest } from './types';

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

export const resumeWorkflowInputSchema = z.object({
  githubUrl: z.preprocess(blankToUndefined, z.string().url().nullish()),
  portfolioUrl: z.preprocess(blankToUndefined, z.string().url().nullish()),
  jobDescription: z.preprocess(blankToUndefined, z.string().nullish()),
});

export const RESUME_INPUT_KEYS: readonly ResumeInputKey[] = ['githubUrl', 'portfolioUrl', 'jobDescription'];

export const RESUME_EXTRA_KEYS: readonly ResumeExtraKey[] = ['oldResumeText', 'userFeedback', 'userAdditions'];

const RESUME_REQUEST_LABELS: Record<ResumeInputKey | ResumeExtraKey, string> = {
  githubUrl: 'GitHub URL',
  portfolioUrl: 'Portfolio URL',
  jobDescription: 'Job Description',
  oldResumeText: 'Old Resume Text',
  userFeedback: 'User Feedback',
  userAdditions: 'User Additions',
};

/**
 * Labels of the request fields which carry a value, in request order.
 *
 * @example
 * summarizeProvidedInputs({ githubUrl: 'https://github.com/octocat', userFeedback: '  ' }); // ['GitHub URL']
 */
export const summarizeProvidedInputs = (request: ResumeWorkflowRequest): string[] =>
  [...RESUME_INPUT_KEYS, ...RESUME_EXTRA_KEYS]
    .filter((key) => resolveInput(request[key]) !== null)
    .map((key) => RESUME_REQUEST_LABELS[key]);

/**
 * Splits a flat request into producer inputs and free-form extras.
 */
export const splitResumeRequest = (
  request: ResumeWorkflowRequest,
): {
  inputs: Partial<Record<ResumeInputKey, string | null>>;
  extras: Partial<Record<ResumeExtraKey, string>>;
} => {
  const inputs: Partial<Record<ResumeInputKey, string | null>> = {};
  for (const key of RESUME_INPUT_KEYS) {
    inputs[key] = request[key] ?? null;
  }
  const extras: Partial<Record<ResumeExtraKey, string>> = {};
  for (const key of RESUME_EXTRA_KEYS) {
    const value = request[key];
    if (!isNullOrUndefined(value)) extras[key] = value;
  }
  return { inputs, extras };
};
