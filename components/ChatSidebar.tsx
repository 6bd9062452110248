import React from 'react';
import { Filter, Info, MessageCircle } from 'lucide-react';
import type { ChatHistory, FilterSelection } from '../types';
import { Logo } from './Logo';

const ALL = 'All';

interface Props {
  history: ChatHistory;
  categories: string[];
  occasions: string[];
  filters: FilterSelection;
  onFiltersChange: (filters: FilterSelection) => void;
}

const FilterSelect: React.FC<{
  id: string;
  label: string;
  options: string[];
  value?: string;
  onChange: (value?: string) => void;
}> = ({ id, label, options, value, onChange }) => (
  <div className="mb-4">
    <label htmlFor={id} className="block text-xs font-bold uppercase tracking-wider text-slate-500 mb-1.5">{label}</label>
    <select
      id={id}
      value={value ?? ALL}
      onChange={e => onChange(e.target.value === ALL ? undefined : e.target.value)}
      className="w-full bg-white border border-amber-100 rounded-xl px-3 py-2 text-sm font-bold text-slate-700 focus:outline-none focus:ring-2 focus:ring-rose-200"
    >
      {[ALL, ...options].map(option => (
        <option key={option} value={option}>{option}</option>
      ))}
    </select>
  </div>
);

export const ChatSidebar: React.FC<Props> = ({ history, categories, occasions, filters, onFiltersChange }) => {
  return (
    <aside className="w-full md:w-80 shrink-0 bg-amber-100/40 border-r border-amber-100 p-6 flex flex-col gap-6 md:h-[100dvh] md:overflow-y-auto">
      <Logo size="sm" />

      <section>
        <h2 className="flex items-center gap-2 text-sm font-black text-slate-700 mb-3">
          <Filter size={16} /> Filters
        </h2>
        <FilterSelect
          id="filter-category"
          label="Category"
          options={categories}
          value={filters.category}
          onChange={category => onFiltersChange({ ...filters, category })}
        />
        <FilterSelect
          id="filter-occasion"
          label="Occasion"
          options={occasions}
          value={filters.occasion}
          onChange={occasion => onFiltersChange({ ...filters, occasion })}
        />
      </section>

      <section className="flex-1 min-h-0">
        <h2 className="flex items-center gap-2 text-sm font-black text-slate-700 mb-3">
          <MessageCircle size={16} /> This Conversation
        </h2>
        {history.length === 0 ? (
          <p className="text-xs text-slate-400">No conversation history yet.</p>
        ) : (
          <ol data-testid="sidebar-history" className="flex flex-col gap-2">
            {history.map((turn, i) => (
              <li key={i} className="text-xs text-slate-600 bg-white/70 rounded-xl px-3 py-2">
                <span className="font-bold">{turn.role === 'user' ? 'You' : 'Bot'}:</span>{' '}
                <span className="line-clamp-2">{turn.text}</span>
              </li>
            ))}
          </ol>
        )}
      </section>

      <details className="text-xs text-slate-500">
        <summary className="flex items-center gap-2 font-bold cursor-pointer"><Info size={14} /> About</summary>
        <p className="mt-2 leading-relaxed">
          Ask about traditional and modern Indian garments. Answers come from Google Gemini;
          matching pieces from our collection are shown as cards below the chat.
        </p>
      </details>
    </aside>
  );
};
