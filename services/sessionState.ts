import type { PipelineOutcome, SessionState } from '../types';

export const createEmptySession = (): SessionState => ({
  finalLetter: '',
  factsBlock: '',
  recentJobs: [],
  jdSummary: null,
});

export const hasFinalLetter = (session: SessionState): boolean => session.finalLetter.length > 0;

/** Only a successful run replaces the session; every other outcome keeps it. */
export const applyOutcome = (previous: SessionState, outcome: PipelineOutcome): SessionState =>
  outcome.status === 'success' ? outcome.session : previous;
