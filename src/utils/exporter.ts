import fs from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import dayjs from 'dayjs';
import type { Listing } from '../schemas/listing';
import { resolveListingDate } from '../extractors/normalize';

export const CSV_COLUMNS = [
  'id', 'portal', 'property_type', 'title', 'price', 'price_per_sqm',
  'bedrooms', 'bathrooms', 'parking_spaces', 'area', 'neighborhood',
  'city', 'state', 'condo_fee', 'iptu', 'total_cost', 'url',
  'source_page', 'collected_at', 'listing_date',
] as const;

type Column = (typeof CSV_COLUMNS)[number];
type Cell = string | number;

const cell = (v: string | number | null | undefined): Cell => v ?? '';

export function toRecord(l: Listing): Record<Column, Cell> {
  const a = l.attributes;
  return {
    id: l.id,
    portal: l.portal,
    property_type: cell(a.property_type),
    title: cell(a.title),
    price: l.price,
    price_per_sqm: cell(a.price_per_sqm),
    bedrooms: cell(a.bedrooms),
    bathrooms: cell(a.bathrooms),
    parking_spaces: cell(a.parking_spaces),
    area: cell(a.area),
    neighborhood: cell(a.neighborhood),
    city: cell(a.city),
    state: cell(a.state),
    condo_fee: cell(a.condo_fee),
    iptu: cell(a.iptu),
    total_cost: cell(a.total_cost),
    url: cell(a.url),
    source_page: l.source_page,
    collected_at: l.collected_at,
    listing_date: cell(resolveListingDate(a.listing_date, l.collected_at)),
  };
}

/** CSV com colunas fixas; campo ausente vira célula vazia. */
export function toCsv(data: Listing[], opts: { bom?: boolean } = {}): string {
  return stringify(data.map(toRecord), { header: true, columns: [...CSV_COLUMNS], bom: opts.bom ?? false });
}

function outputBase(dir: string, portal: string, session: string) {
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  return path.join(dir, `${dayjs().format('YYYY-MM-DD')}-${portal}-${session}`.replace(/\s+/g, '_'));
}

export function exportJSON(dir: string, portal: string, session: string, data: Listing[]): string {
  const file = `${outputBase(dir, portal, session)}.json`;
  fs.writeFileSync(file, JSON.stringify(data, null, 2), 'utf-8');
  return file;
}

// com BOM, para o Excel
export function exportCSV(dir: string, portal: string, session: string, data: Listing[]): string {
  const file = `${outputBase(dir, portal, session)}.csv`;
  fs.writeFileSync(file, toCsv(data, { bom: true }), 'utf-8');
  return file;
}
