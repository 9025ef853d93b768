import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { FastifyInstance } from 'fastify';
import { buildTestApp, mockData, parseJsonResponse } from './setup.js';

interface ErrorBody {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
}

interface LayoutBody {
  title: string;
  startDate: string;
  endDate: string;
  totalDays: number;
  columns: Array<{ width: number; monthName: string }>;
  rows: Array<{ title: string; resourceIndex: number; offset: number; length?: number; open: boolean }>;
  resourceStyles: Array<{ color: string }>;
}

const SVG_HEADER = (width: number, height: number) =>
  `<svg viewBox="0 0 ${width} ${height}" xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" style="background-color: white;">`;

describe('Chart routes', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildTestApp();
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('GET /health', () => {
    it('reports ok', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      expect(parseJsonResponse<{ status: string }>(res)).toEqual({ status: 'ok' });
    });
  });

  describe('POST /api/charts/svg', () => {
    it('renders an SVG document', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/charts/svg',
        payload: mockData.chartBody(),
      });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toBe('image/svg+xml; charset=utf-8');
      expect(res.body.split('\n')[0]).toBe(SVG_HEADER(310, 180));
      expect(res.body).toContain('<text class="title" x="10" y="25">Test Plan</text>');
      expect(res.body).not.toContain('<g id="resources">');
    });

    it('adds the resource legend on request', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/charts/svg?resourceTable=true',
        payload: mockData.chartBody(),
      });

      expect(res.statusCode).toBe(200);
      expect(res.body.split('\n')[0]).toBe(SVG_HEADER(310, 240));
      expect(res.body).toContain('    <text class="resource" x="105" y="190">Alice</text>');
    });

    it('applies a title width override', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/charts/svg?titleWidth=100',
        payload: mockData.chartBody(),
      });

      expect(res.statusCode).toBe(200);
      expect(res.body.split('\n')[0]).toBe(SVG_HEADER(200, 180));
    });

    it('escapes titles', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/charts/svg',
        payload: mockData.chartBody({ title: 'Q1 <R&D>' }),
      });

      expect(res.body).toContain('<text class="title" x="10" y="25">Q1 &lt;R&amp;D&gt;</text>');
    });

    it('rejects a single-item schedule', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/charts/svg',
        payload: mockData.chartBody({
          items: [{ title: 'Alone', startDate: '2024-01-01T00:00:00', resource: 0 }],
        }),
      });

      expect(res.statusCode).toBe(400);
      expect(parseJsonResponse<ErrorBody>(res)).toEqual({
        error: 'Chart Error',
        message: 'You must provide more than one task',
        statusCode: 400,
        details: { code: 'INSUFFICIENT_ITEMS', itemCount: 1 },
      });
    });

    it('rejects a resource index outside the resource list', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/charts/svg',
        payload: mockData.chartBody({
          items: [
            { title: 'A', startDate: '2024-01-01T00:00:00', duration: 2, resource: 0 },
            { title: 'B', duration: 2, resource: 5 },
          ],
        }),
      });

      expect(res.statusCode).toBe(400);
      expect(parseJsonResponse<ErrorBody>(res).details).toEqual({
        code: 'RESOURCE_OUT_OF_RANGE',
        itemIndex: 1,
        resource: 5,
        resourceCount: 2,
      });
    });

    it('rejects a first item without a start date', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/charts/svg',
        payload: mockData.chartBody({
          items: [
            { title: 'A', duration: 2, resource: 0 },
            { title: 'B', duration: 2 },
          ],
        }),
      });

      expect(res.statusCode).toBe(400);
      expect(parseJsonResponse<ErrorBody>(res).message).toBe('First item must contain a start date');
    });

    it('rejects an impossible calendar date', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/charts/svg',
        payload: mockData.chartBody({
          items: [
            { title: 'A', startDate: '2024-02-30T00:00:00', duration: 2, resource: 0 },
            { title: 'B', duration: 2 },
          ],
        }),
      });

      expect(res.statusCode).toBe(400);
      expect(parseJsonResponse<ErrorBody>(res)).toEqual({
        error: 'Validation Error',
        message: 'Request validation failed',
        statusCode: 400,
        details: [
          { path: 'items.0.startDate', message: 'Invalid date-time. Expected YYYY-MM-DDTHH:MM:SS' },
        ],
      });
    });

    it('rejects a marked date with a time component', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/charts/svg',
        payload: mockData.chartBody({ markedDate: '2024-01-15T10:00' }),
      });

      expect(res.statusCode).toBe(400);
      expect(parseJsonResponse<ErrorBody>(res).details).toEqual([
        { path: 'markedDate', message: 'Invalid date. Expected YYYY-MM-DD' },
      ]);
    });

    it('rejects a negative width override', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/charts/svg?maxMonthWidth=-5',
        payload: mockData.chartBody(),
      });

      expect(res.statusCode).toBe(400);
      expect(parseJsonResponse<ErrorBody>(res).error).toBe('Validation Error');
    });

    it('rejects a duration beyond the cap', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/charts/svg',
        payload: mockData.chartBody({
          items: [
            { title: 'A', startDate: '2024-01-01T00:00:00', duration: 1_000_000_000, resource: 0 },
            { title: 'B', duration: 3 },
          ],
        }),
      });

      expect(res.statusCode).toBe(400);
      expect(parseJsonResponse<ErrorBody>(res)).toEqual({
        error: 'Validation Error',
        message: 'Request validation failed',
        statusCode: 400,
        details: [
          { path: 'items.0.duration', message: 'Number must be less than or equal to 100000' },
        ],
      });
    });

    it('falls back to the default for an empty width override', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/charts/svg?titleWidth=',
        payload: mockData.chartBody(),
      });

      expect(res.statusCode).toBe(200);
      expect(res.body.split('\n')[0]).toBe(SVG_HEADER(310, 180));
    });

    it('rejects a malformed JSON body', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/charts/svg',
        headers: { 'content-type': 'application/json' },
        payload: '{"title": ',
      });

      expect(res.statusCode).toBe(400);
      expect(parseJsonResponse<ErrorBody>(res).error).toBe('Bad Request');
    });
  });

  describe('POST /api/charts/layout', () => {
    it('returns the geometry model', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/charts/layout',
        payload: mockData.chartBody(),
      });

      expect(res.statusCode).toBe(200);
      const body = parseJsonResponse<LayoutBody>(res);

      expect(body.title).toBe('Test Plan');
      expect(body.startDate).toBe('2024-01-01T00:00:00.000Z');
      expect(body.endDate).toBe('2024-01-31T00:00:00.000Z');
      expect(body.totalDays).toBe(31);
      expect(body.columns).toEqual([{ width: 80, monthName: 'Jan' }]);
      expect(body.rows.map((r) => r.title)).toEqual(['Design', 'Build', 'Launch']);
      expect(body.rows[0].offset).toBe(220);
      expect(body.rows[1].resourceIndex).toBe(1);
      expect(body.rows[2]).not.toHaveProperty('length');
      expect(body.resourceStyles.map((s) => s.color)).toEqual(['#804040', '#405280']);
    });

    it('includes the marked date offset when given', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/charts/layout',
        payload: mockData.chartBody({ markedDate: '2024-01-01' }),
      });

      expect(res.statusCode).toBe(200);
      expect(parseJsonResponse<{ markedDateOffset: number }>(res).markedDateOffset).toBe(220);
    });
  });
});

describe('Chart routes with configured defaults', () => {
  it('shows the legend when the defaults ask for it', async () => {
    const app = await buildTestApp({ resourceTable: true, titleWidth: 150 });
    await app.ready();

    const res = await app.inject({
      method: 'POST',
      url: '/api/charts/svg',
      payload: mockData.chartBody(),
    });

    expect(res.body.split('\n')[0]).toBe(SVG_HEADER(250, 240));

    const overridden = await app.inject({
      method: 'POST',
      url: '/api/charts/svg?resourceTable=false',
      payload: mockData.chartBody(),
    });

    expect(overridden.body.split('\n')[0]).toBe(SVG_HEADER(250, 180));
    await app.close();
  });
});
