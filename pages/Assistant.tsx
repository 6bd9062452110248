import React, { useEffect, useMemo, useRef, useState } from 'react';
import { AlertCircle, Loader2, SearchX, Send } from 'lucide-react';
import clsx from 'clsx';
import { ChatMessage } from '../components/ChatMessage';
import { ChatSidebar } from '../components/ChatSidebar';
import { GarmentCard } from '../components/GarmentCard';
import { submitMessage } from '../services/assistantService';
import type { ReplySource } from '../services/assistantService';
import { createTurn, ResponseCache } from '../services/chatSession';
import { findGarments, listCategories, OCCASIONS } from '../services/garmentStore';
import type { ChatHistory, ChatTurn, ExtractedTerm, FilterSelection, GarmentRecord } from '../types';

interface Props {
  garments: GarmentRecord[];
  client: ReplySource;
}

type Phase = 'idle' | 'responding';

const NO_KEYWORDS: readonly ExtractedTerm[] = [];

export const Assistant: React.FC<Props> = ({ garments, client }) => {
  const [history, setHistory] = useState<ChatHistory>([]);
  const [phase, setPhase] = useState<Phase>('idle');
  const [error, setError] = useState<string | null>(null);
  const [input, setInput] = useState('');
  const [pendingTurn, setPendingTurn] = useState<ChatTurn | null>(null);
  const [filters, setFilters] = useState<FilterSelection>({});
  // Keywords of the last answered message; null until the first answer
  const [lastKeywords, setLastKeywords] = useState<readonly ExtractedTerm[] | null>(null);
  // null until a question is answered or a filter is set
  const [results, setResults] = useState<GarmentRecord[] | null>(null);

  const cache = useRef(new ResponseCache());
  const chatEndRef = useRef<HTMLDivElement>(null);

  const categories = useMemo(() => listCategories(garments), [garments]);

  // Filter changes re-run the last query locally; no model call
  const handleFiltersChange = (next: FilterSelection) => {
    setFilters(next);
    setResults(
      lastKeywords || next.category || next.occasion
        ? findGarments(garments, { keywords: lastKeywords ?? NO_KEYWORDS, ...next })
        : null
    );
  };

  useEffect(() => {
    chatEndRef.current?.scrollIntoView?.({ behavior: 'smooth' });
  }, [history.length]);

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault();
    if (phase === 'responding' || !input.trim()) return;

    const pending = input;
    setPhase('responding');
    setError(null);
    setInput('');
    // Shown while waiting; the turn result carries the real history
    setPendingTurn(createTurn('user', pending.trim()));

    try {
      const result = await submitMessage({
        history,
        message: pending,
        filters,
        garments,
        client,
        cache: cache.current
      });
      setHistory(result.history);
      if (result.status === 'failed') {
        setError(result.error);
      } else if (result.status === 'answered') {
        setLastKeywords(result.keywords);
        setResults(result.garments);
      }
    } catch (err) {
      console.error("Chat turn failed", err);
      setError(err instanceof Error ? err.message : 'Something went wrong. Please try again.');
    } finally {
      setPendingTurn(null);
      setPhase('idle');
    }
  };

  return (
    <div className="min-h-[100dvh] flex flex-col md:flex-row bg-amber-50 text-slate-800">
      <ChatSidebar
        history={history}
        categories={categories}
        occasions={OCCASIONS}
        filters={filters}
        onFiltersChange={handleFiltersChange}
      />

      <main className="flex-1 min-w-0 md:h-[100dvh] md:overflow-y-auto p-6 md:p-10">
        <header className="mb-6">
          <h1 className="text-3xl font-black text-slate-900 font-serif">🪔 Indian Dress Assistant</h1>
          <p className="text-slate-500 mt-1">Ask me anything about traditional and modern Indian garments!</p>
        </header>

        <section data-testid="chat-log" className="mb-4">
          {history.map((turn, i) => <ChatMessage key={i} turn={turn} />)}
          {pendingTurn && <ChatMessage turn={pendingTurn} />}
          {phase === 'responding' && (
            <div className="flex items-center gap-2 text-sm text-slate-400 mb-3">
              <Loader2 size={16} className="animate-spin" /> Thinking...
            </div>
          )}
          <div ref={chatEndRef} />
        </section>

        {error && (
          <div role="alert" className="flex items-center gap-2 bg-red-50 text-red-600 text-sm font-bold px-4 py-3 rounded-2xl mb-4">
            <AlertCircle size={16} /> {error}
          </div>
        )}

        <form onSubmit={handleSubmit} className="flex gap-3 mb-10">
          <input
            type="text"
            aria-label="Message"
            value={input}
            onChange={e => setInput(e.target.value)}
            placeholder="e.g., I'm attending an Indian wedding, what should I wear?"
            className="flex-1 bg-white border border-amber-100 rounded-full px-5 py-3 text-sm focus:outline-none focus:ring-2 focus:ring-rose-200"
          />
          <button
            type="submit"
            disabled={phase === 'responding'}
            className={clsx(
              "inline-flex items-center gap-2 px-6 py-3 rounded-full font-bold text-white shadow-lg transition-colors",
              phase === 'responding' ? "bg-slate-300 cursor-not-allowed" : "bg-rose-500 hover:bg-rose-600"
            )}
          >
            <Send size={16} /> Send
          </button>
        </form>

        {results && (
          <section>
            <h2 className="text-xl font-black text-slate-800 mb-4">From Our Collection</h2>
            {results.length === 0 ? (
              <div className="flex flex-col items-center justify-center text-center py-12 text-slate-400">
                <SearchX size={32} className="mb-2" />
                <p className="font-bold">No matching garments in our collection.</p>
              </div>
            ) : (
              <div className="grid gap-5 grid-cols-1 sm:grid-cols-2 xl:grid-cols-3">
                {results.map(garment => (
                  <GarmentCard key={garment.id ?? `${garment.category}-${garment.name}`} garment={garment} />
                ))}
              </div>
            )}
          </section>
        )}
      </main>
    </div>
  );
};
