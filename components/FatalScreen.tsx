import React from 'react';
import { AlertCircle } from 'lucide-react';

interface Props {
  title: string;
  summary: string;
  detail: string;
  onRetry?: () => void;
}

export const FatalScreen: React.FC<Props> = ({ title, summary, detail, onRetry }) => (
  <div className="min-h-screen flex items-center justify-center p-8 bg-amber-50 font-sans text-slate-800">
    <div role="alert" className="bg-white p-8 rounded-[2rem] shadow-xl max-w-md w-full text-center">
      <div className="w-16 h-16 bg-red-100 text-red-500 rounded-full flex items-center justify-center mx-auto mb-4">
        <AlertCircle size={32} />
      </div>
      <h1 className="text-2xl font-bold text-slate-900 mb-2 font-serif">{title}</h1>
      <p className="text-slate-500 mb-4">{summary}</p>
      <div className="bg-slate-50 p-4 rounded-xl text-left overflow-auto max-h-40 text-xs font-mono text-red-600 border border-slate-100">
        {detail}
      </div>
      {onRetry && (
        <button
          onClick={onRetry}
          className="mt-6 bg-rose-500 text-white font-bold px-8 py-3 rounded-full hover:bg-rose-600 transition-colors shadow-lg"
        >
          Reload
        </button>
      )}
    </div>
  </div>
);
