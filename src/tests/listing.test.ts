import { describe, expect, it } from 'vitest';
import { extractListing, type ExtractContext } from '../extractors/listing';
import type { RawRecord } from '../scrapers/types';

const now = new Date('2024-07-10T12:00:00.000Z');

const zap: ExtractContext = {
  portal: 'zap',
  locationFormat: 'street-neighborhood-city',
  defaults: { state: 'SP' },
  pageIndex: 2,
  now,
};

const zapCard: RawRecord = {
  fields: {
    title: 'Apartamento 2 quartos no Centro',
    url: 'https://www.zapimoveis.com.br/imovel/venda-apartamento-2-quartos-centro-id-2712345678/',
    price: 'R$ 350.000',
    location: 'Rua das Flores, Centro, São José dos Campos',
    date: 'ontem',
  },
  text: '65 m² 2 quartos 1 banheiro Condomínio R$ 500 IPTU R$ 100',
};

describe('extractListing', () => {
  it('monta o anúncio a partir dos campos e do texto do card', () => {
    const result = extractListing(zapCard, zap);
    expect(result).toEqual({
      ok: true,
      listing: {
        id: '2712345678',
        id_source: 'portal',
        portal: 'zap',
        price: 350000,
        attributes: {
          title: 'Apartamento 2 quartos no Centro',
          property_type: 'apartamento',
          url: 'https://www.zapimoveis.com.br/imovel/venda-apartamento-2-quartos-centro-id-2712345678/',
          bedrooms: 2,
          bathrooms: 1,
          parking_spaces: null,
          area: 65,
          price_per_sqm: 5384.62,
          condo_fee: 500,
          iptu: 100,
          total_cost: 350600,
          street: 'Rua das Flores',
          neighborhood: 'Centro',
          city: 'São José dos Campos',
          state: 'SP',
          address: 'Rua das Flores, Centro, São José dos Campos',
          listing_date: 'ontem',
        },
        collected_at: '2024-07-10T12:00:00.000Z',
        source_page: 2,
      },
    });
  });

  it('é idempotente para o mesmo card', () => {
    expect(extractListing(zapCard, zap)).toEqual(extractListing(zapCard, zap));
  });

  it('lê o formato cidade, bairro da OLX', () => {
    const result = extractListing(
      {
        fields: {
          title: 'Casa 3 quartos',
          url: 'https://sp.olx.com.br/vale-do-paraiba/imoveis/casa-3-quartos-1234567890',
          price: 'R$ 2.500',
          location: 'São José dos Campos, Jardim Aquarius',
        },
      },
      { ...zap, portal: 'olx', locationFormat: 'city-neighborhood' },
    );
    if (!result.ok) throw new Error(`rejeitado: ${result.reason}`);
    expect(result.listing.id).toBe('1234567890');
    expect(result.listing.price).toBe(2500);
    expect(result.listing.attributes.neighborhood).toBe('Jardim Aquarius');
    expect(result.listing.attributes.city).toBe('São José dos Campos');
    expect(result.listing.attributes.property_type).toBe('casa');
  });

  it('rejeita card sem preço legível', () => {
    const raw: RawRecord = { fields: { id: 'x1', price: 'Sob consulta' } };
    expect(extractListing(raw, zap)).toEqual({ ok: false, reason: 'missing_price' });
  });

  it('não escala preço nem área com ponto decimal no lugar errado', () => {
    const raw: RawRecord = { fields: { id: 'x3', price: 'R$ 2500.00', area: '45.5 m²' } };
    expect(extractListing(raw, zap)).toEqual({ ok: false, reason: 'missing_price' });

    const withArea = extractListing({ fields: { id: 'x4', price: 'R$ 2.500', area: '45.5 m²' } }, zap);
    if (!withArea.ok) throw new Error(`rejeitado: ${withArea.reason}`);
    expect(withArea.listing.attributes.area).toBeNull();
    expect(withArea.listing.attributes.price_per_sqm).toBeNull();
  });

  it('usa o preço do texto quando não há campo de preço', () => {
    const result = extractListing({ fields: { id: 'x2' }, text: 'Apartamento R$ 1.234,56 ao mês' }, zap);
    expect(result.ok && result.listing.price).toBe(1234.56);
  });

  it('gera id por conteúdo quando o portal não expõe um', () => {
    const raw: RawRecord = { fields: { price: 'R$ 200.000', location: 'Rua B, Centro, Jacareí' } };
    const result = extractListing(raw, zap);
    if (!result.ok) throw new Error(`rejeitado: ${result.reason}`);
    expect(result.listing.id_source).toBe('content_hash');
    expect(result.listing.id).toMatch(/^[0-9a-f]{16}$/);
  });

  it('rejeita card sem id quando o id por conteúdo está desligado', () => {
    const raw: RawRecord = { fields: { price: 'R$ 200.000', location: 'Rua B, Centro, Jacareí' } };
    expect(extractListing(raw, { ...zap, allowHashIds: false })).toEqual({ ok: false, reason: 'missing_id' });
  });

  it('filtra por bairro sem diferenciar acentos e caixa', () => {
    const raw: RawRecord = { fields: { id: 'y1', price: 'R$ 300.000', location: 'Rua C, Jardim Aquárius, São José dos Campos' } };
    expect(extractListing(raw, { ...zap, neighborhoods: ['jardim aquarius'] }).ok).toBe(true);
    expect(extractListing(raw, { ...zap, neighborhoods: ['Centro'] })).toEqual({ ok: false, reason: 'filtered' });
  });
});
