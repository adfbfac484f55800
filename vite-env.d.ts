/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_GEMINI_API_KEY?: string;
  readonly VITE_LETTER_MODEL?: string;
  readonly VITE_LOG_LEVEL?: string;
}
