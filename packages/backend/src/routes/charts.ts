import { FastifyInstance } from 'fastify';
import { chartSchema, renderOptionsSchema } from '../schemas/chart.schema.js';

export async function chartsRoutes(fastify: FastifyInstance): Promise<void> {
  // POST /api/charts/svg - Render a schedule as an SVG document
  fastify.post<{ Body: unknown; Querystring: Record<string, unknown> }>(
    '/api/charts/svg',
    async (request, reply) => {
      const chart = chartSchema.parse(request.body);
      const query = renderOptionsSchema.parse(request.query);
      const options = fastify.chartService.resolveOptions(query, fastify.chartDefaults);

      const { svg } = fastify.chartService.render(chart, options, request.log);
      return reply.code(200).type('image/svg+xml; charset=utf-8').send(svg);
    }
  );

  // POST /api/charts/layout - Computed geometry, without drawing it
  fastify.post<{ Body: unknown; Querystring: Record<string, unknown> }>(
    '/api/charts/layout',
    async (request, reply) => {
      const chart = chartSchema.parse(request.body);
      const query = renderOptionsSchema.parse(request.query);
      const options = fastify.chartService.resolveOptions(query, fastify.chartDefaults);

      const layout = fastify.chartService.layout(chart, options, request.log);
      return reply.code(200).send(layout);
    }
  );
}
