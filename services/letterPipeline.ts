import type { LetterInput, LlmError, PipelineOutcome, PipelineStage, SessionState } from '../types';
import {
  buildCvFactsPrompt,
  buildDraftPrompt,
  buildJdSummaryPrompt,
  buildRecentJobsPrompt,
  buildVerifyPrompt,
  type PromptPair,
  RECENT_JOB_LIMIT,
} from './letterPrompts';
import { summarizeJdReply } from './jdSummaryService';
import { createGenerationClient, EMPTY_RESPONSE, type GenerationClient, requestCompletion } from './llmService';
import { createLogger } from './logService';

export interface PipelineRuntimeOptions {
  createClient?: (apiKey: string) => GenerationClient;
  onStageChange?: (stage: PipelineStage) => void;
}

export const MESSAGES = {
  missingApiKey: 'Please provide your Gemini API key.',
  emptyCv: 'CV input is empty.',
  emptyJobDescription: 'Job description input is empty.',
  noFacts: 'No facts extracted. Check the CV input or try a different file.',
  upstream: 'Gemini request failed. Check your API key and try again.',
} as const;

const BULLET_MARKER = '- ';

const logger = createLogger('letter');

/** Pasted text wins over an uploaded file when both are present. */
export const pickInput = (pasted: string, uploaded: string): string => {
  const trimmed = pasted.trim();
  return trimmed ? trimmed : uploaded.trim();
};

export const parseBullets = (text: string): string[] =>
  text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.startsWith(BULLET_MARKER))
    .map(line => line.slice(BULLET_MARKER.length).trim());

export const toBulletBlock = (items: string[]): string =>
  items.map(item => `${BULLET_MARKER}${item}`).join('\n');

class StageFailure extends Error {
  constructor(readonly outcome: PipelineOutcome) {
    super(outcome.status);
    this.name = 'StageFailure';
  }
}

/**
 * Runs the letter pipeline: JD summary, CV facts, recent jobs, draft, and a
 * fact-checking rewrite, strictly in that order. The first failure stops the
 * run; a session is only produced once verification has returned.
 */
export const runLetterPipeline = async (
  input: LetterInput,
  options: PipelineRuntimeOptions = {}
): Promise<PipelineOutcome> => {
  const apiKey = input.apiKey.trim();
  if (!apiKey) return { status: 'input_error', message: MESSAGES.missingApiKey };

  const cv = input.cvText.trim();
  const jobDescription = pickInput(input.jobDescriptionPasted, input.jobDescriptionUploaded);
  const exampleLetter = input.exampleLetterText.trim();

  if (!cv) return { status: 'input_error', message: MESSAGES.emptyCv };
  if (!jobDescription) return { status: 'input_error', message: MESSAGES.emptyJobDescription };

  const client = (options.createClient ?? createGenerationClient)(apiKey);

  const stageFailure = (stage: PipelineStage, error: LlmError): StageFailure => {
    logger.warn('stage_failed', { stage, category: error.category });
    return new StageFailure({ status: 'upstream_error', stage, error, message: MESSAGES.upstream });
  };

  // Blank replies are data for the extraction stages; the letter stages need text.
  const runStage = async (stage: PipelineStage, prompt: PromptPair, requireText = false): Promise<string> => {
    options.onStageChange?.(stage);
    const startedAt = Date.now();
    const result = await requestCompletion(client, {
      model: input.model,
      system: prompt.system,
      user: prompt.user,
      temperature: prompt.temperature,
    });

    if (!result.ok) throw stageFailure(stage, result.error);
    if (requireText && !result.text) throw stageFailure(stage, EMPTY_RESPONSE);

    logger.info('stage_done', { stage, elapsedMs: Date.now() - startedAt });
    return result.text;
  };

  try {
    const jdReply = await runStage('summarizing_jd', buildJdSummaryPrompt(jobDescription));
    const jdSummary = summarizeJdReply(jdReply);
    if (jdSummary.kind === 'fallback') {
      logger.info('jd_summary_fallback', { requirements: jdSummary.requirements.length });
    }

    const facts = parseBullets(await runStage('extracting_facts', buildCvFactsPrompt(cv)));
    if (facts.length === 0) {
      logger.warn('no_facts_extracted');
      return { status: 'extraction_error', message: MESSAGES.noFacts };
    }
    const factsBlock = toBulletBlock(facts);

    const recentJobs = parseBullets(
      await runStage('extracting_jobs', buildRecentJobsPrompt(cv))
    ).slice(0, RECENT_JOB_LIMIT);

    const draftLetter = await runStage(
      'drafting',
      buildDraftPrompt(jobDescription, factsBlock, exampleLetter),
      true
    );
    const finalLetter = await runStage('verifying', buildVerifyPrompt(factsBlock, draftLetter), true);

    const session: SessionState = { finalLetter, factsBlock, recentJobs, jdSummary };
    return { status: 'success', session };
  } catch (error) {
    if (error instanceof StageFailure) return error.outcome;
    throw error;
  }
};
