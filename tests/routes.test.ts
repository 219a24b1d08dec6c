import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createApp } from '../server/app';
import type { CatalogueSource } from '../server/db';
import { FurnitureParser } from '../server/parser';
import { formatDuration } from '../server/routes';
import { QuerySuggestion, StyleSuggester } from '../server/suggestion';

const catalogue: CatalogueSource = {
  fetchProductNames: async (prefix) => (prefix.toLowerCase() === 'mod' ? [{ id: 'p1', name: 'Modena Sofa' }] : []),
  fetchBrandNames: async () => [],
};

const stats = { cacheEntries: 3, cacheTables: ['Brand', 'Product'], connectionPoolActive: true };

const app = createApp({
  parser: new FurnitureParser(),
  suggest: new QuerySuggestion(catalogue, new StyleSuggester(['modern', 'mod', 'rustic'])),
  database: { getStats: () => stats },
});

describe('formatDuration', () => {
  it('reports milliseconds below one second and seconds above', () => {
    expect(formatDuration(12.5)).toBe('12.50 ms');
    expect(formatDuration(999.99)).toBe('999.99 ms');
    expect(formatDuration(1500)).toBe('1.50 sec');
  });
});

describe('POST /query/analyze', () => {
  it('returns the parsed query with its processing time', async () => {
    const res = await request(app).post('/query/analyze').send({ query: 'coffee tabel under $300' });

    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.result).toMatchObject({
      product_type: ['Coffee Table'],
      features: [],
      price_range: { min: null, max: 300, currency: 'USD', confidence: 0.8 },
      location: '',
      extras: [],
      confidence_score: 0.8,
      original_query: 'coffee tabel under $300',
      suggested_query: 'coffee table under $300',
    });
    expect(res.body.result.processing_time).toMatch(/^\d+\.\d{2} (ms|sec)$/);
  });

  it('rejects a missing query', async () => {
    const res = await request(app).post('/query/analyze').send({});

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, error: 'Query is required' });
  });

  it('rejects a blank query', async () => {
    const res = await request(app).post('/query/analyze').send({ query: '   ' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, error: 'Query is required' });
  });

  it('rejects malformed JSON', async () => {
    const res = await request(app).post('/query/analyze').set('Content-Type', 'application/json').send('{"query":');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, error: 'Invalid request body' });
  });
});

describe('POST /query/suggestion', () => {
  it('returns product names, brand names and styles', async () => {
    const res = await request(app).post('/query/suggestion').send({ query: 'mod' });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      product_name: [{ id: 'p1', name: 'Modena Sofa' }],
      brand_name: [],
      styles: ['Modern', 'Mod'],
    });
  });

  it('rejects a missing query', async () => {
    const res = await request(app).post('/query/suggestion').send({ text: 'mod' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, error: 'Query is required' });
  });
});

describe('GET endpoints', () => {
  it('reports health', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('healthy');
    expect(res.body.service).toBe('query-parser-api');
    expect(typeof res.body.timestamp).toBe('string');
  });

  it('reports database stats', async () => {
    const res = await request(app).get('/api/debug/db-stats');

    expect(res.status).toBe(200);
    expect(res.body).toEqual(stats);
  });
});
