import fs from 'fs/promises';
import path from 'path';
import dayjs from 'dayjs';
import { describe, expect, it } from 'vitest';
import type { Listing } from '../schemas/listing';
import { exportCSV, exportJSON, toCsv } from '../utils/exporter';
import { tmpDir } from './helpers';

const collected = new Date(2024, 6, 10, 12, 0, 0).toISOString();

const apartment: Listing = {
  id: '2712345678',
  id_source: 'portal',
  portal: 'zap',
  price: 350000,
  attributes: {
    title: 'Apartamento 2 quartos',
    property_type: 'apartamento',
    url: 'https://www.zapimoveis.com.br/imovel/id-2712345678/',
    bedrooms: 2,
    bathrooms: 1,
    parking_spaces: null,
    area: 65,
    price_per_sqm: 5384.62,
    total_cost: 350000,
    neighborhood: 'Centro',
    city: 'São José dos Campos',
    state: 'SP',
    listing_date: 'ontem',
  },
  collected_at: collected,
  source_page: 1,
};

const house: Listing = {
  id: 'c0ffee0123456789',
  id_source: 'content_hash',
  portal: 'zap',
  price: 720000,
  attributes: { title: 'Casa, 3 quartos', condo_fee: 450, iptu: 200, total_cost: 720650 },
  collected_at: collected,
  source_page: 2,
};

describe('exporter', () => {
  it('toCsv escreve cabeçalho fixo e células vazias para campos ausentes', () => {
    const lines = toCsv([apartment, house]).split('\n');
    expect(lines[0]).toBe(
      'id,portal,property_type,title,price,price_per_sqm,bedrooms,bathrooms,parking_spaces,area,neighborhood,city,state,condo_fee,iptu,total_cost,url,source_page,collected_at,listing_date',
    );
    expect(lines[1]).toBe(
      `2712345678,zap,apartamento,Apartamento 2 quartos,350000,5384.62,2,1,,65,Centro,São José dos Campos,SP,,,350000,https://www.zapimoveis.com.br/imovel/id-2712345678/,1,${collected},09/07/2024`,
    );
    expect(lines[2]).toBe(`c0ffee0123456789,zap,,"Casa, 3 quartos",720000,,,,,,,,,450,200,720650,,2,${collected},`);
    expect(lines[3]).toBe('');
  });

  it('grava JSON e CSV com data, portal e sessão no nome', async () => {
    const dir = path.join(await tmpDir(), 'data');
    const day = dayjs().format('YYYY-MM-DD');

    const json = exportJSON(dir, 'zap', '20240710_120000', [apartment]);
    expect(json).toBe(path.join(dir, `${day}-zap-20240710_120000.json`));
    expect(JSON.parse(await fs.readFile(json, 'utf-8'))).toEqual([apartment]);

    const csv = exportCSV(dir, 'zap', '20240710_120000', [apartment]);
    expect(csv).toBe(path.join(dir, `${day}-zap-20240710_120000.csv`));
    const content = await fs.readFile(csv, 'utf-8');
    expect(content.startsWith('\uFEFFid,portal,')).toBe(true);
  });
});
