import fp from 'fastify-plugin';
import { FastifyInstance } from 'fastify';
import { getChartConfig } from '../lib/config/chart.js';
import type { ChartConfig } from '../lib/config/chart.js';
import { ChartService, chartService } from '../services/chart.service.js';

declare module 'fastify' {
  interface FastifyInstance {
    chartDefaults: ChartConfig;
    chartService: ChartService;
  }
}

export interface ChartPluginOptions {
  /** Defaults to the environment config. */
  defaults?: ChartConfig;
  /** Defaults to the shared service, which draws colors from Math.random. */
  service?: ChartService;
}

async function chartPlugin(fastify: FastifyInstance, opts: ChartPluginOptions): Promise<void> {
  fastify.decorate('chartDefaults', opts.defaults ?? getChartConfig());
  fastify.decorate('chartService', opts.service ?? chartService);
}

export default fp(chartPlugin, {
  name: 'chart',
});
