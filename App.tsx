import React, { useRef, useState } from 'react';
import Header from './components/Header';
import InputPreview from './components/InputPreview';
import LetterResults from './components/LetterResults';
import ProgressIndicator from './components/ProgressIndicator';
import SettingsPanel from './components/SettingsPanel';
import { appConfig } from './config';
import { extractTextFromUpload, readUpload } from './services/documentService';
import { pickInput, runLetterPipeline } from './services/letterPipeline';
import { createLogger } from './services/logService';
import { applyOutcome, createEmptySession, hasFinalLetter } from './services/sessionState';
import type { PipelineStage, SessionState, UploadSlot } from './types';

const UPLOAD_LABELS: Record<UploadSlot, string> = {
  cv: 'CV',
  exampleLetter: 'example letter',
  jobDescription: 'job description',
};

const EMPTY_UPLOAD_TEXTS: Record<UploadSlot, string> = {
  cv: '',
  exampleLetter: '',
  jobDescription: '',
};

const logger = createLogger('app');

const App: React.FC = () => {
  const [apiKey, setApiKey] = useState(appConfig.defaultApiKey);
  const [model, setModel] = useState(appConfig.modelOptions[0]);
  const [uploadTexts, setUploadTexts] = useState<Record<UploadSlot, string>>(EMPTY_UPLOAD_TEXTS);
  const [uploadNames, setUploadNames] = useState<Partial<Record<UploadSlot, string>>>({});
  const [pendingSlots, setPendingSlots] = useState<ReadonlySet<UploadSlot>>(new Set());
  // Latest selection per slot; an extraction that finishes after a newer one started is dropped.
  const uploadTokens = useRef<Record<UploadSlot, number>>({ cv: 0, exampleLetter: 0, jobDescription: 0 });
  const [jobDescriptionPasted, setJobDescriptionPasted] = useState('');
  const [stage, setStage] = useState<PipelineStage | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [session, setSession] = useState<SessionState>(createEmptySession);

  const jobDescriptionPreview = pickInput(jobDescriptionPasted, uploadTexts.jobDescription);

  const readingUploads = pendingSlots.size > 0;

  const setPending = (slot: UploadSlot, pending: boolean) => {
    setPendingSlots(prev => {
      const next = new Set(prev);
      if (pending) next.add(slot);
      else next.delete(slot);
      return next;
    });
  };

  const storeUpload = (slot: UploadSlot, text: string, name: string | null) => {
    setUploadTexts(prev => ({ ...prev, [slot]: text }));
    setUploadNames(prev => {
      const next = { ...prev };
      if (name === null) delete next[slot];
      else next[slot] = name;
      return next;
    });
  };

  const handleUpload = async (slot: UploadSlot, file: File | null) => {
    const token = ++uploadTokens.current[slot];
    if (!file) {
      storeUpload(slot, '', null);
      setPending(slot, false);
      return;
    }

    setPending(slot, true);
    const isCurrent = () => uploadTokens.current[slot] === token;
    try {
      const text = await extractTextFromUpload(await readUpload(file));
      if (isCurrent()) storeUpload(slot, text, file.name);
    } catch (err) {
      logger.error('upload_failed', { slot, errorName: err instanceof Error ? err.name : typeof err });
      if (isCurrent()) {
        storeUpload(slot, '', null);
        setError(`Failed to read ${UPLOAD_LABELS[slot]}.`);
      }
    } finally {
      if (isCurrent()) setPending(slot, false);
    }
  };

  const handleGenerate = async (e: React.FormEvent) => {
    e.preventDefault();
    if (readingUploads) return;
    setLoading(true);
    setError(null);
    try {
      const outcome = await runLetterPipeline(
        {
          apiKey,
          model,
          cvText: uploadTexts.cv,
          jobDescriptionPasted,
          jobDescriptionUploaded: uploadTexts.jobDescription,
          exampleLetterText: uploadTexts.exampleLetter,
        },
        { onStageChange: setStage }
      );
      if (outcome.status !== 'success') setError(outcome.message);
      setSession(prev => applyOutcome(prev, outcome));
    } catch (err) {
      logger.error('generate_failed', { errorName: err instanceof Error ? err.name : typeof err });
      setError('Letter generation failed unexpectedly.');
    } finally {
      setStage(null);
      setLoading(false);
    }
  };

  return (
    <div className="min-h-screen flex flex-col">
      <Header />

      <main className="flex-grow max-w-7xl mx-auto px-6 py-8 w-full grid grid-cols-1 lg:grid-cols-[320px_1fr] gap-8">
        <SettingsPanel
          apiKey={apiKey}
          model={model}
          modelOptions={appConfig.modelOptions}
          uploadNames={uploadNames}
          jobDescriptionPasted={jobDescriptionPasted}
          disabled={loading}
          onApiKeyChange={setApiKey}
          onModelChange={setModel}
          onUpload={(slot, file) => void handleUpload(slot, file)}
          onJobDescriptionPastedChange={setJobDescriptionPasted}
        />

        <div className="space-y-8">
          <div className="space-y-3">
            <h1 className="text-4xl font-black text-slate-900 tracking-tight">
              Job Application <span className="text-indigo-600">Letter Generator</span>
            </h1>
            <p className="text-slate-500 font-medium">
              Upload your CV, a sample application letter (style only), and a job description. The app extracts
              facts from the CV and writes a one-page letter without adding new info.
            </p>
          </div>

          <div className="grid grid-cols-1 md:grid-cols-3 gap-3">
            {uploadTexts.cv && <InputPreview label="CV preview" text={uploadTexts.cv} />}
            {jobDescriptionPreview && <InputPreview label="Job description preview" text={jobDescriptionPreview} />}
            {uploadTexts.exampleLetter && <InputPreview label="Example letter preview" text={uploadTexts.exampleLetter} />}
          </div>

          <form onSubmit={e => void handleGenerate(e)} className="space-y-4">
            <button
              type="submit"
              disabled={loading || readingUploads}
              className={`px-12 py-5 rounded-3xl font-black text-lg shadow-2xl transition-all ${
                loading || readingUploads ? 'bg-slate-200 text-slate-400 cursor-not-allowed' : 'bg-slate-900 text-white hover:bg-black active:scale-95'
              }`}
            >
              {loading ? 'Generating...' : readingUploads ? 'Reading uploads...' : 'Generate Letter'}
            </button>
            {error && (
              <div role="alert" className="p-4 bg-rose-50 border border-rose-100 text-rose-600 rounded-2xl text-xs text-center font-bold">
                {error}
              </div>
            )}
          </form>

          {stage && <ProgressIndicator stage={stage} />}

          {hasFinalLetter(session) && <LetterResults session={session} />}
        </div>
      </main>
    </div>
  );
};

export default App;
