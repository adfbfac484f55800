import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MESSAGES, parseBullets, pickInput, runLetterPipeline } from '../services/letterPipeline';
import type { GenerationClient, GenerationRequest } from '../services/llmService';
import type { LetterInput, PipelineStage } from '../types';

class ApiError extends Error {
  constructor(readonly status: number) {
    super(`got status: ${status}`);
    this.name = 'ApiError';
  }
}

const JD_REPLY = '{"company_name":"Acme","role_title":"Python Engineer","requirements":["Python"]}';
const FACTS_REPLY = 'Facts from the CV:\n- Worked at Acme 2019–2022 as Engineer\n  - Engineer title at Acme\nno bullet here';
const JOBS_REPLY = '- 2019–2022 | Engineer | Acme';
const DRAFT_REPLY = 'Dear Hiring Manager,\nI worked at Acme as an Engineer and at Globex.';
const FINAL_REPLY = '  Dear Hiring Manager,\nI worked at Acme as an Engineer.\n';

const buildInput = (overrides: Partial<LetterInput> = {}): LetterInput => ({
  apiKey: 'test-secret',
  model: 'gemini-2.5-flash',
  cvText: '- Worked at Acme 2019–2022 as Engineer',
  jobDescriptionPasted: 'We need a Python engineer at Acme',
  jobDescriptionUploaded: '',
  exampleLetterText: '',
  ...overrides,
});

const createFakeModel = (replies: Array<string | Error>) => {
  const requests: GenerationRequest[] = [];
  const client: GenerationClient = {
    models: {
      generateContent: async params => {
        requests.push(params);
        const reply = replies[requests.length - 1];
        if (reply instanceof Error) throw reply;
        return { text: reply };
      },
    },
  };
  const createClient = vi.fn((apiKey: string) => {
    expect(apiKey).toBe('test-secret');
    return client;
  });
  return { requests, createClient };
};

const FULL_RUN = [JD_REPLY, FACTS_REPLY, JOBS_REPLY, DRAFT_REPLY, FINAL_REPLY];

describe('runLetterPipeline', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('runs every stage in order and returns the verified letter', async () => {
    const { requests, createClient } = createFakeModel(FULL_RUN);
    const stages: PipelineStage[] = [];

    const outcome = await runLetterPipeline(buildInput(), {
      createClient,
      onStageChange: stage => stages.push(stage),
    });

    expect(stages).toEqual(['summarizing_jd', 'extracting_facts', 'extracting_jobs', 'drafting', 'verifying']);
    expect(requests.map(request => request.config.systemInstruction)).toEqual([
      'You extract structured info from a job description.',
      'You extract factual statements from a CV.',
      'You extract recent job stations from a CV.',
      'You write job application letters using only provided facts.',
      'You are a strict factual editor.',
    ]);
    expect(requests.map(request => request.config.temperature)).toEqual([0, 0, 0, 0.2, 0]);
    expect(requests.every(request => request.model === 'gemini-2.5-flash')).toBe(true);

    expect(outcome).toEqual({
      status: 'success',
      session: {
        finalLetter: 'Dear Hiring Manager,\nI worked at Acme as an Engineer.',
        factsBlock: '- Worked at Acme 2019–2022 as Engineer\n- Engineer title at Acme',
        recentJobs: ['2019–2022 | Engineer | Acme'],
        jdSummary: {
          kind: 'structured',
          companyName: 'Acme',
          roleTitle: 'Python Engineer',
          requirements: ['Python'],
        },
      },
    });
  });

  it('feeds facts and the draft into the later prompts', async () => {
    const { requests, createClient } = createFakeModel(FULL_RUN);

    await runLetterPipeline(buildInput(), { createClient });

    const factsBlock = 'FACTS:\n- Worked at Acme 2019–2022 as Engineer\n- Engineer title at Acme\n';
    expect(requests[3].contents).toContain('JOB DESCRIPTION:\nWe need a Python engineer at Acme\n');
    expect(requests[3].contents).toContain(factsBlock);
    expect(requests[3].contents).toContain('EXAMPLE LETTER (style only):\n[none]\n');
    expect(requests[4].contents).toContain(factsBlock);
    expect(requests[4].contents).toContain(`LETTER:\n${DRAFT_REPLY}\n`);
  });

  it('passes the example letter to the draft prompt', async () => {
    const { requests, createClient } = createFakeModel(FULL_RUN);

    await runLetterPipeline(buildInput({ exampleLetterText: '  Dear team,\nKind regards  ' }), { createClient });

    expect(requests[3].contents).toContain('EXAMPLE LETTER (style only):\nDear team,\nKind regards\n');
  });

  it('prefers pasted job description text over an upload', async () => {
    const { requests, createClient } = createFakeModel(FULL_RUN);

    await runLetterPipeline(
      buildInput({ jobDescriptionPasted: '  Pasted JD  ', jobDescriptionUploaded: 'Uploaded JD' }),
      { createClient }
    );

    expect(requests[0].contents).toContain('JD:\nPasted JD\n');
    expect(requests[0].contents).not.toContain('Uploaded JD');
  });

  it('uses the uploaded job description when nothing is pasted', async () => {
    const { requests, createClient } = createFakeModel(FULL_RUN);

    await runLetterPipeline(
      buildInput({ jobDescriptionPasted: '   ', jobDescriptionUploaded: 'Uploaded JD' }),
      { createClient }
    );

    expect(requests[0].contents).toContain('JD:\nUploaded JD\n');
  });

  it('makes no calls without an API key', async () => {
    const { requests, createClient } = createFakeModel(FULL_RUN);

    const outcome = await runLetterPipeline(buildInput({ apiKey: '   ' }), { createClient });

    expect(outcome).toEqual({ status: 'input_error', message: MESSAGES.missingApiKey });
    expect(createClient).not.toHaveBeenCalled();
    expect(requests).toHaveLength(0);
  });

  it('rejects an empty CV or job description before calling the model', async () => {
    const { requests, createClient } = createFakeModel(FULL_RUN);

    await expect(runLetterPipeline(buildInput({ cvText: ' \n ' }), { createClient })).resolves.toEqual({
      status: 'input_error',
      message: MESSAGES.emptyCv,
    });
    await expect(
      runLetterPipeline(buildInput({ jobDescriptionPasted: '', jobDescriptionUploaded: '' }), { createClient })
    ).resolves.toEqual({ status: 'input_error', message: MESSAGES.emptyJobDescription });
    expect(requests).toHaveLength(0);
  });

  it('stops before drafting when no facts are extracted', async () => {
    const { requests, createClient } = createFakeModel([JD_REPLY, 'I could not find any facts.']);

    const outcome = await runLetterPipeline(buildInput(), { createClient });

    expect(outcome).toEqual({ status: 'extraction_error', message: MESSAGES.noFacts });
    expect(requests).toHaveLength(2);
  });

  it('reports no facts when the facts reply is blank', async () => {
    const { requests, createClient } = createFakeModel([JD_REPLY, '']);

    const outcome = await runLetterPipeline(buildInput(), { createClient });

    expect(outcome).toEqual({ status: 'extraction_error', message: MESSAGES.noFacts });
    expect(requests).toHaveLength(2);
  });

  it('continues with no recent jobs when the jobs reply is blank', async () => {
    const { requests, createClient } = createFakeModel([JD_REPLY, FACTS_REPLY, '', DRAFT_REPLY, FINAL_REPLY]);

    const outcome = await runLetterPipeline(buildInput(), { createClient });

    expect(requests).toHaveLength(5);
    expect(outcome.status).toBe('success');
    if (outcome.status !== 'success') return;
    expect(outcome.session.recentJobs).toEqual([]);
    expect(outcome.session.finalLetter).toBe('Dear Hiring Manager,\nI worked at Acme as an Engineer.');
  });

  it('fails the verification stage when it returns no letter', async () => {
    const { createClient } = createFakeModel([JD_REPLY, FACTS_REPLY, JOBS_REPLY, DRAFT_REPLY, ' \n']);

    const outcome = await runLetterPipeline(buildInput(), { createClient });

    expect(outcome).toEqual({
      status: 'upstream_error',
      stage: 'verifying',
      error: { category: 'empty_response', errorName: 'EmptyResponse' },
      message: MESSAGES.upstream,
    });
  });

  it('stops at the first upstream failure', async () => {
    const { requests, createClient } = createFakeModel([JD_REPLY, FACTS_REPLY, new ApiError(500)]);

    const outcome = await runLetterPipeline(buildInput(), { createClient });

    expect(outcome).toEqual({
      status: 'upstream_error',
      stage: 'extracting_jobs',
      error: { category: 'api', errorName: 'ApiError' },
      message: MESSAGES.upstream,
    });
    expect(requests).toHaveLength(3);
  });

  it('treats a missing JD summary as a degraded result, not an error', async () => {
    const { createClient } = createFakeModel(['Company: Acme\nRole: Engineer', ...FULL_RUN.slice(1)]);

    const outcome = await runLetterPipeline(buildInput(), { createClient });

    expect(outcome.status).toBe('success');
    if (outcome.status !== 'success') return;
    expect(outcome.session.jdSummary).toEqual({
      kind: 'fallback',
      requirements: ['Company: Acme', 'Role: Engineer'],
    });
  });

  it('tolerates a CV without recognizable job stations', async () => {
    const { createClient } = createFakeModel([JD_REPLY, FACTS_REPLY, 'No positions found.', DRAFT_REPLY, FINAL_REPLY]);

    const outcome = await runLetterPipeline(buildInput(), { createClient });

    expect(outcome.status).toBe('success');
    if (outcome.status !== 'success') return;
    expect(outcome.session.recentJobs).toEqual([]);
  });
});

describe('parseBullets', () => {
  it('keeps only dash-space lines', () => {
    expect(parseBullets('Intro\n- First fact\n  -  Second fact \n-no space\n* star')).toEqual([
      'First fact',
      'Second fact',
    ]);
  });
});

describe('pickInput', () => {
  it('falls back to the uploaded text', () => {
    expect(pickInput('', ' uploaded ')).toBe('uploaded');
    expect(pickInput(' pasted ', 'uploaded')).toBe('pasted');
  });
});
