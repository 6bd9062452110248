import React from 'react';

const LETTERS = [
  { char: 'P', color: 'text-rose-600', tilt: '-rotate-6' },
  { char: 'o', color: 'text-amber-500', tilt: '-rotate-2' },
  { char: 's', color: 'text-emerald-600', tilt: 'rotate-3' },
  { char: 'h', color: 'text-rose-600', tilt: '-rotate-3' },
  { char: 'a', color: 'text-amber-500', tilt: 'rotate-6' },
  { char: 'k', color: 'text-emerald-600', tilt: '-rotate-6' }
];

export const Logo: React.FC<{ size?: 'sm' | 'md' | 'lg' }> = ({ size = 'md' }) => {
  const scale = size === 'sm' ? 0.6 : size === 'lg' ? 1.5 : 1;

  return (
    <div
      className="relative inline-flex items-baseline font-black tracking-tight"
      style={{ fontFamily: '"Nunito", sans-serif', transform: `scale(${scale})`, transformOrigin: 'left center' }}
      aria-label="Poshak"
    >
      {LETTERS.map(({ char, color, tilt }, i) => (
        <span key={i} className={`${color} text-4xl transform ${tilt} inline-block mx-0.5`}>{char}</span>
      ))}
      {/* Diya flame */}
      <svg className="ml-1 -translate-y-3" width="16" height="22" viewBox="0 0 16 22" fill="none" xmlns="http://www.w3.org/2000/svg">
        <path d="M8 1C11 6 14 9 14 13a6 6 0 0 1-12 0c0-4 3-7 6-12Z" fill="#F59E0B" />
        <path d="M8 8c1.5 2.5 3 4 3 6a3 3 0 0 1-6 0c0-2 1.5-3.5 3-6Z" fill="#FDE68A" />
      </svg>
    </div>
  );
};
