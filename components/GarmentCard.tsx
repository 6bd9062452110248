import React from 'react';
import { MapPin, ShoppingBag, Sparkles } from 'lucide-react';
import clsx from 'clsx';
import { formatPrice } from '../services/garmentStore';
import type { GarmentRecord } from '../types';

interface Props {
  garment: GarmentRecord;
}

export const GarmentCard: React.FC<Props> = ({ garment }) => {
  return (
    <article
      data-testid="garment-card"
      className="bg-white rounded-[2rem] overflow-hidden shadow-lg shadow-amber-100/60 border border-amber-50 flex flex-col"
    >
      <div className="relative aspect-[4/5] bg-amber-50">
        <img src={garment.imageUrl} alt={garment.name} loading="lazy" className="w-full h-full object-cover" />
        <span
          className={clsx(
            "absolute top-3 right-3 px-3 py-1 rounded-full text-[10px] font-bold uppercase tracking-wider",
            garment.available ? "bg-emerald-100 text-emerald-700" : "bg-slate-200 text-slate-500"
          )}
        >
          {garment.available ? 'In Stock' : 'Out of Stock'}
        </span>
      </div>

      <div className="p-4 flex flex-col gap-2 flex-1">
        <div>
          <p className="text-[10px] font-bold uppercase tracking-wider text-rose-500">{garment.category}</p>
          <h3 className="text-lg font-bold text-slate-800 leading-tight">{garment.name}</h3>
        </div>
        <p className="text-xs text-slate-500">{garment.description}</p>

        <dl className="grid grid-cols-2 gap-x-3 gap-y-1 text-xs text-slate-600">
          <dt className="font-bold">Fabric</dt><dd>{garment.fabric}</dd>
          <dt className="font-bold">Sizes</dt><dd>{garment.sizes}</dd>
        </dl>

        <div className="flex items-center gap-3 text-xs text-slate-500">
          <span className="inline-flex items-center gap-1"><Sparkles size={12} /> {garment.occasion}</span>
          <span className="inline-flex items-center gap-1"><MapPin size={12} /> {garment.region}</span>
        </div>

        <div className="mt-auto pt-3 flex items-center justify-between">
          <span className="text-xl font-black text-slate-900">{formatPrice(garment.price)}</span>
          <a
            href={garment.buyLink}
            target="_blank"
            rel="noopener noreferrer"
            className="inline-flex items-center gap-1.5 bg-rose-500 hover:bg-rose-600 text-white text-sm font-bold px-4 py-2 rounded-full transition-colors"
          >
            <ShoppingBag size={14} /> Buy Now
          </a>
        </div>
      </div>
    </article>
  );
};
