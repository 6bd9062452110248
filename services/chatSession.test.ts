import { describe, expect, it } from 'vitest';
import { appendTurn, createTurn, formatTurnTime, ResponseCache } from './chatSession';

describe('appendTurn', () => {
  it('returns a new history and leaves earlier turns alone', () => {
    const first = createTurn('user', 'Hi', 1000);
    const history = appendTurn([], first);
    const second = createTurn('assistant', 'Namaste!', 2000);

    const next = appendTurn(history, second);

    expect(history).toHaveLength(1);
    expect(next).toHaveLength(2);
    expect(next[0]).toBe(history[0]);
    expect(next[1]).toEqual({ role: 'assistant', text: 'Namaste!', sentAt: 2000 });
    expect(Object.isFrozen(next)).toBe(true);
    expect(Object.isFrozen(next[0])).toBe(true);
  });

  it('keeps turns in the order they were added', () => {
    const texts = ['one', 'two', 'three'];
    const history = texts.reduce((h, text, i) => appendTurn(h, createTurn('user', text, i)), appendTurn([], createTurn('user', 'zero', -1)));
    expect(history.map(t => t.text)).toEqual(['zero', 'one', 'two', 'three']);
  });
});

describe('formatTurnTime', () => {
  it('pads hours and minutes', () => {
    expect(formatTurnTime(new Date(2024, 0, 1, 9, 5).getTime())).toBe('09:05');
    expect(formatTurnTime(new Date(2024, 0, 1, 18, 30).getTime())).toBe('18:30');
  });
});

describe('ResponseCache', () => {
  it('treats questions that differ only in case and spacing as the same', () => {
    const cache = new ResponseCache();
    cache.set('  Wedding Outfit? ', 'A sherwani.');

    expect(cache.get('wedding outfit?')).toBe('A sherwani.');
    expect(cache.get('festival outfit?')).toBeUndefined();
    expect(cache.size).toBe(1);
  });
});
