import dayjs from 'dayjs';
import type { Listing, ListingAttributes } from '../schemas/listing';
import type { ExtractProfile, RawRecord } from '../scrapers/types';
import {
  contentHashId,
  detectPropertyType,
  extractIdFromUrl,
  extractInteger,
  normalizePriceBRL,
  parseDecimalBR,
  pricePerSqm,
  round2,
  splitLocation,
  stripAccents,
} from './normalize';

export type ExtractContext = ExtractProfile & {
  pageIndex: number;
  now: Date;
  neighborhoods?: string[];
  allowHashIds?: boolean;
};

export type RejectReason = 'missing_id' | 'missing_price' | 'filtered';

export type ExtractionResult =
  | { ok: true; listing: Listing }
  | { ok: false; reason: RejectReason };

const TEXT_PATTERNS = {
  price: /R\$\s*(\d[\d.,]*)/,
  condo: /cond(?:om[ií]nio)?\.?:?\s*(R\$\s*\d[\d.,]*)/i,
  iptu: /iptu:?\s*(R\$\s*\d[\d.,]*)/i,
  bedrooms: /(\d+)\s*quartos?/i,
  bathrooms: /(\d+)\s*banheiros?/i,
  parking: /(\d+)\s*vagas?/i,
  area: /(\d[\d.,]*)\s*m²/i,
};

function field(raw: RawRecord, key: string): string | null {
  const v = raw.fields[key];
  if (v === null || v === undefined) return null;
  const t = v.trim();
  return t ? t : null;
}

function match(text: string, re: RegExp): string | null {
  const m = text.match(re);
  return m ? m[1] : null;
}

function matchesNeighborhood(neighborhood: string | null, targets: string[]): boolean {
  if (!neighborhood) return false;
  const hay = stripAccents(neighborhood).toLowerCase();
  return targets.some(t => hay.includes(stripAccents(t).toLowerCase()));
}

/**
 * Transforma um card bruto em `Listing`. Sem id ou sem preço legível o card é rejeitado.
 * Função pura: o mesmo card gera o mesmo anúncio, salvo `collected_at`.
 */
export function extractListing(raw: RawRecord, ctx: ExtractContext): ExtractionResult {
  const text = raw.text ?? '';
  const url = field(raw, 'url');

  const priceField = field(raw, 'price');
  const price = priceField !== null ? normalizePriceBRL(priceField) : parseDecimalBR(match(text, TEXT_PATTERNS.price));

  // preço, condomínio e IPTU às vezes vêm no mesmo bloco de texto
  const feesText = `${priceField ?? ''}\n${text}`;
  const condo = normalizePriceBRL(field(raw, 'condo_fee') ?? match(feesText, TEXT_PATTERNS.condo));
  const iptu = normalizePriceBRL(field(raw, 'iptu') ?? match(feesText, TEXT_PATTERNS.iptu));

  const bedrooms = extractInteger(field(raw, 'bedrooms') ?? match(text, TEXT_PATTERNS.bedrooms));
  const bathrooms = extractInteger(field(raw, 'bathrooms') ?? match(text, TEXT_PATTERNS.bathrooms));
  const parking = extractInteger(field(raw, 'parking') ?? match(text, TEXT_PATTERNS.parking));
  const area = parseDecimalBR(field(raw, 'area') ?? match(text, TEXT_PATTERNS.area));

  const loc = splitLocation(field(raw, 'location'), ctx.locationFormat);
  const street = field(raw, 'street') ?? loc.street;
  const neighborhood = field(raw, 'neighborhood') ?? loc.neighborhood;
  const city = field(raw, 'city') ?? loc.city ?? ctx.defaults?.city ?? null;
  const state = field(raw, 'state') ?? ctx.defaults?.state ?? null;
  const address = [street, neighborhood, city].filter(Boolean).join(', ') || null;

  let id = field(raw, 'id') ?? extractIdFromUrl(url);
  let idSource: Listing['id_source'] = 'portal';
  if (!id && ctx.allowHashIds !== false) {
    id = contentHashId([address, area, bedrooms, bathrooms, parking, price]);
    idSource = 'content_hash';
  }
  if (!id) return { ok: false, reason: 'missing_id' };
  if (price === null) return { ok: false, reason: 'missing_price' };
  if (ctx.neighborhoods?.length && !matchesNeighborhood(neighborhood, ctx.neighborhoods)) {
    return { ok: false, reason: 'filtered' };
  }

  const title = field(raw, 'title');
  const declaredType = field(raw, 'property_type');
  const attributes: ListingAttributes = {
    title,
    property_type: declaredType ? declaredType.toLowerCase() : detectPropertyType(title ?? text),
    url,
    bedrooms,
    bathrooms,
    parking_spaces: parking,
    area,
    price_per_sqm: pricePerSqm(price, area),
    condo_fee: condo,
    iptu,
    total_cost: round2(price + (condo ?? 0) + (iptu ?? 0)),
    street,
    neighborhood,
    city,
    state,
    address,
    listing_date: field(raw, 'date'),
  };

  return {
    ok: true,
    listing: {
      id,
      id_source: idSource,
      portal: ctx.portal,
      price,
      attributes,
      collected_at: dayjs(ctx.now).toISOString(),
      source_page: ctx.pageIndex,
    },
  };
}
