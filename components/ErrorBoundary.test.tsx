import React from 'react';
import { fireEvent, render, screen } from '@testing-library/react';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ErrorBoundary } from './ErrorBoundary';

const Broken: React.FC = () => {
  throw new Error('Garment table is invalid at 3.price: Expected number, received string');
};

describe('ErrorBoundary', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('renders its children while nothing fails', () => {
    render(
      <ErrorBoundary>
        <p>Namaste</p>
      </ErrorBoundary>
    );
    expect(screen.getByText('Namaste')).toBeTruthy();
  });

  it('replaces a crashed tree with the error screen and offers a reload', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const onReload = vi.fn();

    render(
      <ErrorBoundary onReload={onReload}>
        <Broken />
      </ErrorBoundary>
    );

    expect(screen.getByRole('heading', { level: 1 }).textContent).toBe('Oops!');
    expect(screen.getByText('Garment table is invalid at 3.price: Expected number, received string')).toBeTruthy();

    fireEvent.click(screen.getByRole('button', { name: 'Reload' }));
    expect(onReload).toHaveBeenCalledTimes(1);
  });
});
