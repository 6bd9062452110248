import React, { useMemo } from 'react';
import { useLiveQuery } from 'dexie-react-hooks';
import { Loader2 } from 'lucide-react';
import { FatalScreen } from './components/FatalScreen';
import { loadConfig } from './config';
import { loadGarments } from './db';
import { Assistant } from './pages/Assistant';
import { createConversationClient } from './services/geminiService';
import type { ConversationClient } from './services/geminiService';

type Setup = { client: ConversationClient } | { error: string };

const App: React.FC = () => {
  const setup = useMemo<Setup>(() => {
    try {
      return { client: createConversationClient(loadConfig()) };
    } catch (error) {
      console.error("Configuration error:", error);
      return { error: error instanceof Error ? error.message : String(error) };
    }
  }, []);

  // Query errors (an unreadable or invalid table) propagate to the error boundary
  const garments = useLiveQuery(loadGarments);

  if ('error' in setup) {
    return (
      <FatalScreen
        title="Setup needed"
        summary="The assistant cannot start with the current configuration."
        detail={setup.error}
      />
    );
  }

  if (!garments) {
    return (
      <div className="min-h-screen flex items-center justify-center bg-amber-50 text-slate-400">
        <Loader2 size={32} className="animate-spin" />
      </div>
    );
  }

  return (
    <div className="antialiased font-sans selection:bg-rose-200">
      <Assistant garments={garments} client={setup.client} />
    </div>
  );
};

export default App;
