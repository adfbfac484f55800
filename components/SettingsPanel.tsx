import React from 'react';
import type { UploadSlot } from '../types';

interface Props {
  apiKey: string;
  model: string;
  modelOptions: string[];
  uploadNames: Partial<Record<UploadSlot, string>>;
  jobDescriptionPasted: string;
  disabled: boolean;
  onApiKeyChange: (value: string) => void;
  onModelChange: (value: string) => void;
  /** `null` when the picker was cleared. */
  onUpload: (slot: UploadSlot, file: File | null) => void;
  onJobDescriptionPastedChange: (value: string) => void;
}

const UPLOAD_FIELDS: { slot: UploadSlot; label: string }[] = [
  { slot: 'cv', label: 'CV (PDF, DOCX or TXT)' },
  { slot: 'exampleLetter', label: 'Example letter (PDF, DOCX or TXT)' },
  { slot: 'jobDescription', label: 'Job description (PDF, DOCX or TXT)' },
];

const ACCEPTED_EXTENSIONS = '.pdf,.docx,.txt';

const SettingsPanel: React.FC<Props> = ({
  apiKey,
  model,
  modelOptions,
  uploadNames,
  jobDescriptionPasted,
  disabled,
  onApiKeyChange,
  onModelChange,
  onUpload,
  onJobDescriptionPastedChange,
}) => {
  const handleFileChange = (e: React.ChangeEvent<HTMLInputElement>, slot: UploadSlot) => {
    onUpload(slot, e.target.files?.[0] ?? null);
  };

  return (
    <aside className="p-6 rounded-3xl bg-white border border-slate-100 shadow-sm space-y-6">
      <h2 className="text-[10px] font-black text-slate-400 uppercase tracking-widest">Settings</h2>

      <div className="space-y-2">
        <label htmlFor="api-key" className="block text-xs font-bold text-slate-600">Gemini API Key</label>
        <input
          id="api-key"
          type="password"
          value={apiKey}
          disabled={disabled}
          onChange={e => onApiKeyChange(e.target.value)}
          autoComplete="off"
          className="w-full p-3 rounded-xl bg-[#f8fafc] border-none text-sm focus:ring-2 ring-indigo-500"
        />
        <p className="text-[10px] text-slate-400">Stored only in this session.</p>
      </div>

      <div className="space-y-2">
        <label htmlFor="model" className="block text-xs font-bold text-slate-600">Model</label>
        <select
          id="model"
          value={model}
          disabled={disabled}
          onChange={e => onModelChange(e.target.value)}
          className="w-full p-3 rounded-xl bg-[#f8fafc] border-none text-sm"
        >
          {modelOptions.map(option => (
            <option key={option} value={option}>{option}</option>
          ))}
        </select>
      </div>

      <h3 className="text-[10px] font-black text-slate-400 uppercase tracking-widest">Inputs</h3>
      {UPLOAD_FIELDS.map(field => (
        <div key={field.slot}>
          <label htmlFor={`upload-${field.slot}`} className="block text-xs font-bold text-slate-600 mb-2">
            {field.label}
          </label>
          <input
            id={`upload-${field.slot}`}
            type="file"
            accept={ACCEPTED_EXTENSIONS}
            disabled={disabled}
            onChange={e => handleFileChange(e, field.slot)}
            className="block w-full text-xs text-slate-400 file:mr-4 file:py-2 file:px-6 file:rounded-full file:border-0 file:text-xs file:font-black file:bg-indigo-600 file:text-white hover:file:bg-indigo-700 cursor-pointer"
          />
          {uploadNames[field.slot] && (
            <p className="mt-1 text-[10px] text-slate-500">{uploadNames[field.slot]}</p>
          )}
        </div>
      ))}

      <div className="space-y-2">
        <label htmlFor="jd-paste" className="block text-xs font-bold text-slate-600">Or paste job description text</label>
        <textarea
          id="jd-paste"
          value={jobDescriptionPasted}
          disabled={disabled}
          onChange={e => onJobDescriptionPastedChange(e.target.value)}
          className="w-full h-32 p-4 rounded-2xl bg-[#f8fafc] border-none focus:ring-2 ring-indigo-500 text-sm outline-none resize-none"
        />
      </div>
    </aside>
  );
};

export default SettingsPanel;
