export interface PromptPair {
  system: string;
  user: string;
  temperature: number;
}

export const RECENT_JOB_LIMIT = 3;
export const EMPTY_EXAMPLE_MARKER = '[none]';

const EXTRACTION_TEMPERATURE = 0.0;
const DRAFT_TEMPERATURE = 0.2;

export const buildJdSummaryPrompt = (jobDescription: string): PromptPair => ({
  system: 'You extract structured info from a job description.',
  user: `Return JSON with keys: company_name, role_title, requirements.
Requirements must be a list of short strings, only what is explicitly in the JD.

JD:
${jobDescription}
`,
  temperature: EXTRACTION_TEMPERATURE,
});

export const buildCvFactsPrompt = (cv: string): PromptPair => ({
  system: 'You extract factual statements from a CV.',
  user: `Extract only explicit facts from the CV text. Do not infer, generalize, or add info.
Return a bullet list. Each bullet should be one short fact and must be present in the CV text.

CV:
${cv}
`,
  temperature: EXTRACTION_TEMPERATURE,
});

export const buildRecentJobsPrompt = (cv: string): PromptPair => ({
  system: 'You extract recent job stations from a CV.',
  user: `Extract up to ${RECENT_JOB_LIMIT} most recent job stations from the CV.
Return a bullet list with one station per bullet in this format:
YYYY–YYYY | Role | Company
Only use explicit info from the CV. If a field is missing, omit it.

CV:
${cv}
`,
  temperature: EXTRACTION_TEMPERATURE,
});

export const buildDraftPrompt = (
  jobDescription: string,
  factsBlock: string,
  exampleLetter: string
): PromptPair => ({
  system: 'You write job application letters using only provided facts.',
  user: `Write a one-page job application letter (about 250-350 words).

Constraints:
- Use ONLY candidate facts from FACTS.
- Do NOT add any new candidate information, dates, skills, or claims not in FACTS.
- It is OK to mention the company name and role from the job description.
- If a requirement from the job description is not supported by FACTS, do not mention it.
- Use more recent FACTS rather than older ones.
- Use the name of the contact person in the greeting, if available.
- Use the example letter ONLY for tone/structure, not for facts.
- Output plain text, no markdown.

JOB DESCRIPTION:
${jobDescription}

FACTS:
${factsBlock}

EXAMPLE LETTER (style only):
${exampleLetter || EMPTY_EXAMPLE_MARKER}
`,
  temperature: DRAFT_TEMPERATURE,
});

export const buildVerifyPrompt = (factsBlock: string, draftLetter: string): PromptPair => ({
  system: 'You are a strict factual editor.',
  user: `Remove or rewrite any sentence that introduces candidate info not present in FACTS.
If a sentence cannot be fully supported by FACTS, delete it.
Return only the revised letter as plain text.

FACTS:
${factsBlock}

LETTER:
${draftLetter}
`,
  temperature: EXTRACTION_TEMPERATURE,
});
