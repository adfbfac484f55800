import { GoogleGenAI } from '@google/genai';
import type { LlmCallResult, LlmError, LlmErrorCategory } from '../types';
import { createLogger } from './logService';

export interface GenerationRequest {
  model: string;
  contents: string;
  config: {
    systemInstruction: string;
    temperature: number;
  };
}

export interface GenerationResponse {
  text?: string;
}

export interface GenerationClient {
  models: {
    generateContent: (params: GenerationRequest) => Promise<GenerationResponse>;
  };
}

export interface CompletionRequest {
  model: string;
  system: string;
  user: string;
  temperature: number;
}

const logger = createLogger('llm');

const AUTH_STATUS_CODES = new Set([401, 403]);
const RATE_LIMIT_STATUS = 429;

export const EMPTY_RESPONSE: LlmError = { category: 'empty_response', errorName: 'EmptyResponse' };

export const createGenerationClient = (apiKey: string): GenerationClient =>
  new GoogleGenAI({ apiKey });

const readStatus = (error: unknown): number | null => {
  if (typeof error !== 'object' || error === null) return null;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('code' in error && typeof error.code === 'number') return error.code;
  return null;
};

const categorize = (error: unknown): LlmErrorCategory => {
  const status = readStatus(error);
  if (status !== null) {
    if (AUTH_STATUS_CODES.has(status)) return 'auth';
    if (status === RATE_LIMIT_STATUS) return 'rate_limit';
    return 'api';
  }

  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
  if (message.includes('api key') || message.includes('unauthenticated') || message.includes('permission')) {
    return 'auth';
  }
  if (
    message.includes('fetch') ||
    message.includes('network') ||
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('econnreset')
  ) {
    return 'network';
  }
  return 'api';
};

export const classifyLlmError = (error: unknown): LlmError => ({
  category: categorize(error),
  errorName: error instanceof Error ? error.name : typeof error,
});

/**
 * One system/user exchange with the model. Never retries; failures come back
 * as a tagged error and only the error class is logged.
 */
export const requestCompletion = async (
  client: GenerationClient,
  request: CompletionRequest
): Promise<LlmCallResult> => {
  let response: GenerationResponse;
  try {
    response = await client.models.generateContent({
      model: request.model,
      contents: request.user,
      config: {
        systemInstruction: request.system,
        temperature: request.temperature,
      },
    });
  } catch (error) {
    const llmError = classifyLlmError(error);
    logger.error('request_failed', { category: llmError.category, errorName: llmError.errorName });
    return { ok: false, error: llmError };
  }

  // A blank completion is still a reply; only a response without text fails here.
  if (typeof response.text !== 'string') {
    logger.error('request_failed', { category: 'empty_response', errorName: 'EmptyResponse' });
    return { ok: false, error: EMPTY_RESPONSE };
  }
  return { ok: true, text: response.text.trim() };
};
