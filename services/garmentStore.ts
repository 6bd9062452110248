import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { GarmentCategory, Occasion } from '../types';
import type { ExtractedTerm, GarmentQuery, GarmentRecord, TermKind } from '../types';

export const OCCASIONS: Occasion[] = [
  Occasion.Wedding,
  Occasion.Festival,
  Occasion.Casual,
  Occasion.Formal,
  Occasion.Party
];

const garmentSchema = z.object({
  name: z.string().min(1),
  category: z.nativeEnum(GarmentCategory),
  fabric: z.string().min(1),
  price: z.number().nonnegative(),
  sizes: z.string().min(1),
  available: z.boolean(),
  description: z.string(),
  gender: z.enum(['Men', 'Women', 'Unisex']),
  season: z.enum(['All', 'Summer', 'Winter', 'Monsoon']),
  imageUrl: z.string().url(),
  buyLink: z.string().url(),
  region: z.enum(['North', 'South', 'East', 'West']),
  occasion: z.nativeEnum(Occasion)
}).strict();

/**
 * Validates the seed rows of the garment table. Throws ConfigurationError on a
 * malformed row or a repeated name + category pair.
 */
export const parseGarmentSeed = (raw: unknown): GarmentRecord[] => {
  const result = z.array(garmentSchema).safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(
      `Garment table is invalid at ${issue.path.join('.') || 'root'}: ${issue.message}`,
      { cause: result.error }
    );
  }

  const seen = new Set<string>();
  for (const garment of result.data) {
    const key = `${garment.name}\u0000${garment.category}`;
    if (seen.has(key)) {
      throw new ConfigurationError(`Garment table lists "${garment.name}" (${garment.category}) twice`);
    }
    seen.add(key);
  }
  return result.data;
};

type SearchableField = 'name' | 'category' | 'fabric' | 'occasion' | 'region';

// Garment names carry types and fabrics too ("Banarasi Silk Saree")
const FIELDS_BY_KIND: Record<Exclude<TermKind, 'gender'>, readonly SearchableField[]> = {
  category: ['category', 'name'],
  fabric: ['fabric', 'name'],
  occasion: ['occasion'],
  region: ['region']
};

const sameValue = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();

const matchesTerm = (garment: GarmentRecord, { term, kind }: ExtractedTerm): boolean => {
  // Whole values: "men" is part of "women"
  if (kind === 'gender') return garment.gender === 'Unisex' || sameValue(garment.gender, term);
  const needle = term.toLowerCase();
  return FIELDS_BY_KIND[kind].some(field => garment[field].toLowerCase().includes(needle));
};

const groupByKind = (keywords: readonly ExtractedTerm[]): ExtractedTerm[][] => {
  const groups = new Map<TermKind, ExtractedTerm[]>();
  keywords.forEach(keyword => {
    const term = keyword.term.trim();
    if (!term) return;
    groups.set(keyword.kind, [...(groups.get(keyword.kind) ?? []), { term, kind: keyword.kind }]);
  });
  return Array.from(groups.values());
};

/**
 * Looks up garments for a chat turn or a filter change.
 *
 * Each keyword is matched against the columns of its kind only (case-insensitive
 * substring; gender compares whole values and Unisex fits either). Keywords of the
 * same kind are alternatives, so "wedding or festival" takes both; every kind named
 * has to match. Category and occasion filters compare whole values.
 * Results keep the table order; no match gives an empty array.
 */
export const findGarments = (garments: readonly GarmentRecord[], query: GarmentQuery): GarmentRecord[] => {
  const groups = groupByKind(query.keywords);
  const { category, occasion } = query;

  return garments.filter(garment => {
    if (category && !sameValue(garment.category, category)) return false;
    if (occasion && !sameValue(garment.occasion, occasion)) return false;
    return groups.every(group => group.some(keyword => matchesTerm(garment, keyword)));
  });
};

export const listCategories = (garments: readonly GarmentRecord[]): string[] =>
  Array.from(new Set(garments.map(g => g.category))).sort((a, b) => a.localeCompare(b));

export const formatPrice = (price: number): string => `₹${price.toFixed(2)}`;
