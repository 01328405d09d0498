import type { Page } from 'playwright-core';
import type { PortalProfile, RawRecord } from './types';

const SELECTORS = {
  card: 'section.olx-adcard',
  link: 'a.olx-adcard__link',
  title: 'h2.olx-adcard__title',
  price: 'h3.olx-adcard__price',
  priceInfo: 'div[data-testid="adcard-price-info"]',
  date: 'p.olx-adcard__date',
  location: 'p.olx-adcard__location',
  bedrooms: 'div.olx-adcard__detail[aria-label*="quartos"]',
  area: 'div.olx-adcard__detail[aria-label*="metros"]',
  parking: 'div.olx-adcard__detail[aria-label*="vagas"]',
  bathrooms: 'div.olx-adcard__detail[aria-label*="banheiro"]',
};

export const OlxProfile: PortalProfile = {
  name: 'OLX',
  portal: 'olx',
  homeUrl: 'https://www.olx.com.br',
  // aluguel em São José dos Campos, 3+ quartos, 2+ vagas
  defaultSearchUrl:
    'https://www.olx.com.br/imoveis/aluguel/estado-sp/vale-do-paraiba-e-litoral-norte/sao-jose-dos-campos?sf=1&gsp=2&ros=3&ros=4&ros=5',
  // "São José dos Campos, Jardim Aquarius"
  locationFormat: 'city-neighborhood',
  defaults: { state: 'SP' },
  selectors: SELECTORS,

  pageUrl(searchUrl: string, pageIndex: number) {
    const url = new URL(searchUrl);
    if (pageIndex > 1) url.searchParams.set('o', String(pageIndex));
    else url.searchParams.delete('o');
    return url.toString();
  },

  async collectRecords(page: Page): Promise<RawRecord[]> {
    return page.locator(SELECTORS.card).evaluateAll((cards, sel) => cards.map(card => {
      const text = (s: string) => card.querySelector(s)?.textContent?.trim() || null;
      const link = card.querySelector<HTMLAnchorElement>(sel.link);
      const infos = Array.from(card.querySelectorAll(sel.priceInfo)).map(e => e.textContent ?? '');
      return {
        fields: {
          url: link ? link.href : null,
          title: text(sel.title),
          price: text(sel.price),
          iptu: infos.find(t => t.includes('IPTU')) ?? null,
          condo_fee: infos.find(t => t.includes('Condomínio')) ?? null,
          date: text(sel.date),
          location: text(sel.location),
          bedrooms: text(sel.bedrooms),
          area: text(sel.area),
          parking: text(sel.parking),
          bathrooms: text(sel.bathrooms),
        },
        text: card.textContent,
      };
    }), SELECTORS);
  },
};
