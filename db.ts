import Dexie, { type Table } from 'dexie';
import garmentSeed from './data/garments.json';
import { parseGarmentSeed } from './services/garmentStore';
import type { GarmentRecord } from './types';

export class GarmentDatabase extends Dexie {
  garments!: Table<GarmentRecord, number>;

  constructor(name = 'IndianDressDB') {
    super(name);
    this.version(1).stores({
      garments: '++id, name, category, occasion, region'
    });

    // The table is written once, when the database is first created; the app only reads it.
    this.on('populate', (tx) => {
      return tx.table('garments').bulkAdd(parseGarmentSeed(garmentSeed));
    });
  }
}

export const db = new GarmentDatabase();

// Primary key order is insertion order
export const loadGarments = (): Promise<GarmentRecord[]> => db.garments.toArray();
