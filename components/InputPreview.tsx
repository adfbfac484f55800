import React from 'react';
import { excerptBullets } from '../services/excerptService';

interface Props {
  label: string;
  text: string;
}

const InputPreview: React.FC<Props> = ({ label, text }) => (
  <details className="rounded-xl border border-slate-200 bg-white p-3">
    <summary className="cursor-pointer text-[10px] font-black uppercase tracking-widest text-slate-500">
      {label}
    </summary>
    <pre className="mt-3 whitespace-pre-wrap text-[11px] leading-relaxed text-slate-600 max-h-64 overflow-auto">
      {excerptBullets(text)}
    </pre>
  </details>
);

export default InputPreview;
