import React from 'react';
import clsx from 'clsx';
import { formatTurnTime } from '../services/chatSession';
import type { ChatTurn } from '../types';

export const ChatMessage: React.FC<{ turn: ChatTurn }> = ({ turn }) => {
  const isUser = turn.role === 'user';

  return (
    <div className={clsx("flex mb-3", isUser ? "justify-end" : "justify-start")}>
      <div
        className={clsx(
          "max-w-[80%] px-4 py-3 rounded-[1.5rem] shadow-sm",
          isUser ? "bg-rose-500 text-white rounded-br-md" : "bg-white text-slate-800 rounded-bl-md border border-amber-100"
        )}
      >
        <p className="whitespace-pre-wrap text-sm leading-relaxed">{turn.text}</p>
        <p className={clsx("mt-1 text-[10px] text-right", isUser ? "text-rose-100" : "text-slate-400")}>
          {formatTurnTime(turn.sentAt)} {isUser ? '👤' : '🪔'}
        </p>
      </div>
    </div>
  );
};
