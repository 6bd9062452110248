
export enum GarmentCategory {
  Saree = 'Saree',
  Lehenga = 'Lehenga',
  SalwarKameez = 'Salwar Kameez',
  KurtaPajama = 'Kurta Pajama',
  Sherwani = 'Sherwani',
  Dhoti = 'Dhoti',
  NehruJacket = 'Nehru Jacket',
  IndoWestern = 'Indo-Western',
  Vesti = 'Vesti'
}

export enum Occasion {
  Wedding = 'Wedding',
  Festival = 'Festival',
  Casual = 'Casual',
  Formal = 'Formal',
  Party = 'Party'
}

export type Region = 'North' | 'South' | 'East' | 'West';

export type Gender = 'Men' | 'Women' | 'Unisex';

export type GarmentSeason = 'All' | 'Summer' | 'Winter' | 'Monsoon';

export interface GarmentRecord {
  id?: number;
  name: string;
  category: GarmentCategory;
  fabric: string;
  price: number;
  sizes: string; // e.g. "S,M,L" or "Free Size"
  available: boolean;
  description: string;
  gender: Gender;
  season: GarmentSeason;
  imageUrl: string;
  buyLink: string;
  region: Region;
  occasion: Occasion;
}

export type ChatRole = 'user' | 'assistant';

export interface ChatTurn {
  readonly role: ChatRole;
  readonly text: string;
  readonly sentAt: number;
}

export type ChatHistory = readonly ChatTurn[];

// Dropdown selections; "All" is represented as undefined
export interface FilterSelection {
  category?: string;
  occasion?: string;
}

export type TermKind = 'category' | 'fabric' | 'occasion' | 'region' | 'gender';

export interface ExtractedTerm {
  term: string;
  kind: TermKind;
}

export interface GarmentQuery extends FilterSelection {
  keywords: readonly ExtractedTerm[];
}
