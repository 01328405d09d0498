import type { Page } from 'playwright-core';
import type { PortalProfile, RawRecord } from './types';

const SELECTORS = {
  card: 'li[data-cy="rp-property-cd"]',
  link: 'a',
  location: '[data-cy="rp-cardProperty-location-txt"]',
  street: '[data-cy="rp-cardProperty-street-txt"]',
  area: '[data-cy="rp-cardProperty-propertyArea-txt"]',
  bedrooms: '[data-cy="rp-cardProperty-bedroomQuantity-txt"]',
  bathrooms: '[data-cy="rp-cardProperty-bathroomQuantity-txt"]',
  parking: '[data-cy="rp-cardProperty-parkingSpacesQuantity-txt"]',
  // aluguel, condomínio e IPTU no mesmo bloco
  price: '[data-cy="rp-cardProperty-price-txt"]',
};

export const ZapProfile: PortalProfile = {
  name: 'ZAP Imóveis',
  portal: 'zap',
  homeUrl: 'https://www.zapimoveis.com.br',
  defaultSearchUrl:
    'https://www.zapimoveis.com.br/aluguel/imoveis/sp+sao-jose-dos-campos/3-quartos/?transacao=aluguel&quartos=3%2C4&vagas=2',
  locationFormat: 'street-neighborhood-city',
  defaults: { city: 'São José dos Campos', state: 'SP' },
  selectors: SELECTORS,

  pageUrl(searchUrl: string, pageIndex: number) {
    const url = new URL(searchUrl);
    if (pageIndex > 1) url.searchParams.set('pagina', String(pageIndex));
    else url.searchParams.delete('pagina');
    return url.toString();
  },

  async collectRecords(page: Page): Promise<RawRecord[]> {
    return page.locator(SELECTORS.card).evaluateAll((cards, sel) => cards.map(card => {
      const text = (s: string) => {
        const el = card.querySelector<HTMLElement>(s);
        return el ? el.innerText.trim() || null : null;
      };
      const link = card.querySelector<HTMLAnchorElement>(sel.link);
      return {
        fields: {
          url: link ? link.href : null,
          location: text(sel.location),
          street: text(sel.street),
          area: text(sel.area),
          bedrooms: text(sel.bedrooms),
          bathrooms: text(sel.bathrooms),
          parking: text(sel.parking),
          price: text(sel.price),
        },
        text: card.textContent,
      };
    }), SELECTORS);
  },
};
