import React from 'react';
import { render, screen } from '@testing-library/react';
import { describe, expect, it } from 'vitest';
import garmentSeed from '../data/garments.json';
import { parseGarmentSeed } from '../services/garmentStore';
import { GarmentCard } from './GarmentCard';

const garments = parseGarmentSeed(garmentSeed);
const byName = (name: string) => {
  const garment = garments.find(g => g.name === name);
  if (!garment) throw new Error(`No garment named ${name}`);
  return garment;
};

describe('GarmentCard', () => {
  it('shows the image, price and buy link', () => {
    render(<GarmentCard garment={byName('Banarasi Silk Saree')} />);

    expect(screen.getByRole('heading', { level: 3 }).textContent).toBe('Banarasi Silk Saree');
    expect(screen.getByAltText('Banarasi Silk Saree').getAttribute('src')).toBe(
      'https://placehold.co/400x500/8b0000/white/png?text=Banarasi+Silk+Saree'
    );
    expect(screen.getByText('₹149.99')).toBeTruthy();
    expect(screen.getByText('In Stock')).toBeTruthy();

    const link = screen.getByRole('link', { name: /buy now/i });
    expect(link.getAttribute('href')).toBe('https://shop.example.com/products/banarasi-silk-saree');
    expect(link.getAttribute('target')).toBe('_blank');
  });

  it('marks garments that are out of stock', () => {
    render(<GarmentCard garment={byName('Straight Cut Salwar Suit')} />);
    expect(screen.getByText('Out of Stock')).toBeTruthy();
  });
});
