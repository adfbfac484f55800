import React, { useState } from 'react';
import type { JdSummary, SessionState } from '../types';
import { DOWNLOAD_FILENAME } from '../config';
import { downloadAsDocx, downloadAsText } from '../services/documentService';
import { createLogger } from '../services/logService';

interface Props {
  session: SessionState;
}

const NOT_FOUND = '[not found]';

const logger = createLogger('results');

const summaryField = (summary: JdSummary | null, field: 'companyName' | 'roleTitle'): string => {
  if (!summary || summary.kind === 'fallback') return NOT_FOUND;
  return summary[field] ?? NOT_FOUND;
};

const BulletList: React.FC<{ items: string[]; label: string }> = ({ items, label }) => (
  <ul aria-label={label} className="mt-2 space-y-1 text-xs text-slate-700 list-disc pl-5">
    {items.map((item, index) => (
      <li key={`${item}-${index}`}>{item}</li>
    ))}
  </ul>
);

const LetterResults: React.FC<Props> = ({ session }) => {
  const [downloadError, setDownloadError] = useState<string | null>(null);

  const requirements = session.jdSummary?.requirements ?? [];
  const factLines = session.factsBlock
    .split('\n')
    .map(line => line.replace(/^- /, '').trim())
    .filter(Boolean);

  const handleDocxDownload = async () => {
    setDownloadError(null);
    try {
      await downloadAsDocx(session.finalLetter, DOWNLOAD_FILENAME);
    } catch (err) {
      logger.error('docx_export_failed', { errorName: err instanceof Error ? err.name : typeof err });
      setDownloadError('Could not build the .docx file. Download the .txt version instead.');
    }
  };

  return (
    <div className="space-y-6">
      <section className="p-6 rounded-3xl bg-white border border-slate-100 shadow-sm">
        <h3 className="text-[10px] font-black uppercase tracking-widest text-slate-500">CV Information</h3>
        <BulletList label="Recent jobs" items={session.recentJobs.length > 0 ? session.recentJobs : [NOT_FOUND]} />
        <h4 className="mt-4 text-[10px] font-black uppercase tracking-widest text-slate-400">Extracted facts</h4>
        <BulletList label="Extracted facts" items={factLines} />
      </section>

      <section className="p-6 rounded-3xl bg-white border border-slate-100 shadow-sm">
        <h3 className="text-[10px] font-black uppercase tracking-widest text-slate-500">Job description summary</h3>
        <ul className="mt-2 space-y-1 text-xs text-slate-700 list-disc pl-5">
          <li>Company: {summaryField(session.jdSummary, 'companyName')}</li>
          <li>Role: {summaryField(session.jdSummary, 'roleTitle')}</li>
          {requirements.length === 0 && <li>Requirements: {NOT_FOUND}</li>}
        </ul>
        {requirements.length > 0 && (
          <>
            <h4 className="mt-4 text-[10px] font-black uppercase tracking-widest text-slate-400">Requirements</h4>
            <BulletList label="Requirements" items={requirements} />
          </>
        )}
      </section>

      <section className="p-6 rounded-3xl bg-white border border-slate-100 shadow-sm space-y-4">
        <h3 className="text-[10px] font-black uppercase tracking-widest text-slate-500">Final letter</h3>
        <label htmlFor="final-letter" className="sr-only">Output</label>
        <textarea
          id="final-letter"
          readOnly
          value={session.finalLetter}
          className="w-full h-96 p-4 rounded-2xl bg-[#f8fafc] border-none text-sm leading-relaxed resize-none"
        />
        <div className="flex gap-3">
          <button
            type="button"
            onClick={() => downloadAsText(session.finalLetter, DOWNLOAD_FILENAME)}
            className="px-6 py-3 rounded-2xl bg-slate-900 text-white text-xs font-black uppercase tracking-widest hover:bg-black"
          >
            Download as .txt
          </button>
          <button
            type="button"
            onClick={() => void handleDocxDownload()}
            className="px-6 py-3 rounded-2xl border border-slate-200 bg-white text-slate-700 text-xs font-black uppercase tracking-widest hover:border-slate-300"
          >
            Download as .docx
          </button>
        </div>
        {downloadError && <p className="text-xs text-rose-600">{downloadError}</p>}
      </section>
    </div>
  );
};

export default LetterResults;
