import crypto from 'crypto';
import dayjs from 'dayjs';

export function stripAccents(text: string): string {
  return text.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

const GROUPED_BR = /^\d{1,3}(\.\d{3})+(,\d+)?$/;
const PLAIN_BR = /^\d+(,\d+)?$/;

// "1.234,56" -> 1234.56; ponto só como separador de milhar em grupos de três dígitos
function toDecimalBR(token: string): number | null {
  const t = token.replace(/[.,]+$/, '');
  if (!GROUPED_BR.test(t) && !PLAIN_BR.test(t)) return null;
  const n = Number(t.replace(/\./g, '').replace(',', '.'));
  return Number.isFinite(n) ? n : null;
}

export function normalizePriceBRL(text?: string | null): number | null {
  if (!text) return null;
  const m = /R\$/.test(text) ? text.match(/R\$\s*(\d[\d.,]*)/) : text.match(/(\d[\d.,]*)/);
  return m ? toDecimalBR(m[1]) : null;
}

export function parseDecimalBR(text?: string | null): number | null {
  if (!text) return null;
  const m = text.match(/(\d[\d.,]*)/);
  return m ? toDecimalBR(m[1]) : null;
}

export function extractInteger(text?: string | null): number | null {
  if (!text) return null;
  const m = text.replace(/\./g, '').match(/\d+/);
  return m ? Number(m[0]) : null;
}

/** ZAP usa `id-2712345678`, OLX termina a URL com `-1234567890`. */
export function extractIdFromUrl(url?: string | null): string | null {
  if (!url) return null;
  const zap = url.match(/id-(\d+)/);
  if (zap) return zap[1];
  const olx = url.match(/-(\d+)(?:[/?#]|$)/);
  return olx ? olx[1] : null;
}

/**
 * Identificador de reserva quando o portal não expõe um id estável.
 * Dois imóveis com mesmo endereço, área, cômodos e preço colidem.
 */
export function contentHashId(parts: Array<string | number | null | undefined>): string | null {
  if (parts.every(p => p === null || p === undefined || p === '')) return null;
  const key = parts.map(p => (p === null || p === undefined ? '' : String(p))).join('|');
  return crypto.createHash('sha1').update(key).digest('hex').slice(0, 16);
}

const PROPERTY_TYPES: Array<[string, RegExp]> = [
  ['cobertura', /\bcobertura\b/],
  ['kitnet', /\b(kitnet|kitinete|quitinete)\b/],
  ['studio', /\b(studio|estudio)\b/],
  ['flat', /\bflat\b/],
  ['apartamento', /\b(apartamento|apto)\b|\bap\./],
  ['casa', /\b(casa|sobrado)\b/],
];

export function detectPropertyType(text?: string | null): string | null {
  if (!text) return null;
  const hay = stripAccents(text).toLowerCase();
  const hit = PROPERTY_TYPES.find(([, re]) => re.test(hay));
  return hit ? hit[0] : null;
}

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function pricePerSqm(price: number | null, area: number | null): number | null {
  if (price === null || area === null || area <= 0) return null;
  return round2(price / area);
}

export type LocationFormat = 'street-neighborhood-city' | 'city-neighborhood';

export type LocationParts = { street: string | null; neighborhood: string | null; city: string | null };

export function splitLocation(text: string | null | undefined, format: LocationFormat): LocationParts {
  const out: LocationParts = { street: null, neighborhood: null, city: null };
  if (!text) return out;
  const parts = text.split(',').map(p => p.trim()).filter(Boolean);
  if (format === 'city-neighborhood') {
    out.city = parts[0] ?? null;
    out.neighborhood = parts[1] ?? null;
    return out;
  }
  if (parts.length >= 3) {
    [out.street, out.neighborhood, out.city] = [parts[0], parts[1], parts[2]];
  } else {
    out.neighborhood = parts[0] ?? null;
    out.city = parts[1] ?? null;
  }
  return out;
}

const MONTHS: Record<string, number> = {
  jan: 1, janeiro: 1, fev: 2, fevereiro: 2, mar: 3, marco: 3,
  abr: 4, abril: 4, mai: 5, maio: 5, jun: 6, junho: 6,
  jul: 7, julho: 7, ago: 8, agosto: 8, set: 9, setembro: 9,
  out: 10, outubro: 10, nov: 11, novembro: 11, dez: 12, dezembro: 12,
};

function calendarDate(ref: dayjs.Dayjs, day: number, month: number): dayjs.Dayjs | null {
  let d = dayjs(new Date(ref.year(), month - 1, day));
  if (d.date() !== day || d.month() !== month - 1) return null;
  // datas sem ano que caem no futuro são do ano anterior
  if (d.isAfter(ref)) d = dayjs(new Date(ref.year() - 1, month - 1, day));
  return d;
}

/**
 * Converte o rótulo de data do card ("hoje", "ontem", "3 dias", "5 de jul, 09:39", "12/06")
 * em `DD/MM/YYYY` relativo a `reference`.
 */
export function resolveListingDate(label: string | null | undefined, reference: Date | string): string | null {
  if (!label) return null;
  const ref = dayjs(reference).startOf('day');
  if (!ref.isValid()) return null;
  let t = stripAccents(label).trim().toLowerCase();
  if (t.includes(',')) t = t.split(',')[0].trim();

  let d: dayjs.Dayjs | null = null;
  if (t.includes('anteontem')) d = ref.subtract(2, 'day');
  else if (t.includes('ontem')) d = ref.subtract(1, 'day');
  else if (t.includes('hoje')) d = ref;
  else if (t.includes(' de ')) {
    const [dayPart, monthPart] = t.split(' de ');
    const day = Number.parseInt(dayPart.replace(/\D/g, ''), 10);
    const month = MONTHS[monthPart.trim().replace(/\.$/, '')];
    if (!month || !Number.isFinite(day)) return null;
    d = calendarDate(ref, day, month);
  } else if (/\bdias?\b/.test(t)) {
    const m = t.match(/(\d+)\s*dias?/);
    d = m ? ref.subtract(Number(m[1]), 'day') : null;
  } else if (/\bsemanas?\b/.test(t)) {
    const m = t.match(/(\d+)\s*semanas?/);
    d = ref.subtract(m ? Number(m[1]) : 1, 'week');
  } else if (/\bm(es|eses)\b/.test(t)) {
    const m = t.match(/(\d+)\s*m(es|eses)/);
    d = ref.subtract(30 * (m ? Number(m[1]) : 1), 'day');
  } else {
    const m = t.match(/(\d{1,2})[/-](\d{1,2})/);
    if (!m) return null;
    d = calendarDate(ref, Number(m[1]), Number(m[2]));
  }
  return d ? d.format('DD/MM/YYYY') : null;
}
