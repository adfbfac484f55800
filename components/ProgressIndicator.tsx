import React from 'react';
import type { PipelineStage } from '../types';

const STAGES: { key: PipelineStage; label: string }[] = [
  { key: 'summarizing_jd', label: 'Extracting job description summary' },
  { key: 'extracting_facts', label: 'Extracting CV facts' },
  { key: 'extracting_jobs', label: 'Extracting recent job stations' },
  { key: 'drafting', label: 'Drafting letter' },
  { key: 'verifying', label: 'Verifying facts' },
];

const ProgressIndicator: React.FC<{ stage: PipelineStage }> = ({ stage }) => {
  const activeIndex = STAGES.findIndex(s => s.key === stage);

  return (
    <div className="rounded-2xl border border-slate-200 bg-white p-4" role="status">
      <p className="text-[10px] font-black uppercase tracking-widest text-slate-500">Progress</p>
      <ol className="mt-3 space-y-2">
        {STAGES.map((s, idx) => {
          const done = activeIndex > idx;
          const active = activeIndex === idx;
          return (
            <li key={s.key} className="flex items-center gap-3" aria-current={active ? 'step' : undefined}>
              <span
                className={[
                  'h-3 w-3 rounded-full border',
                  done ? 'bg-indigo-600 border-indigo-600' : active ? 'bg-indigo-200 border-indigo-400' : 'bg-white',
                ].join(' ')}
              />
              <span className={['text-xs', done || active ? 'text-slate-900 font-bold' : 'text-slate-400'].join(' ')}>
                {s.label}
              </span>
            </li>
          );
        })}
      </ol>
    </div>
  );
};

export default ProgressIndicator;
