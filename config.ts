export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AppEnv {
  VITE_GEMINI_API_KEY?: string;
  VITE_LETTER_MODEL?: string;
  VITE_LOG_LEVEL?: string;
}

export interface AppConfig {
  defaultApiKey: string;
  modelOptions: string[];
  logLevel: LogLevel;
}

export const DEFAULT_MODEL = 'gemini-2.5-flash';
export const DOWNLOAD_FILENAME = 'application_letter';

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some(level => level === value);

export const readAppConfig = (env: AppEnv): AppConfig => {
  const model = env.VITE_LETTER_MODEL?.trim() || DEFAULT_MODEL;
  const logLevel = env.VITE_LOG_LEVEL?.trim().toLowerCase() ?? '';

  return {
    defaultApiKey: env.VITE_GEMINI_API_KEY?.trim() ?? '',
    // Exactly one model is offered.
    modelOptions: [model],
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
  };
};

export const appConfig: AppConfig = readAppConfig(import.meta.env);
