import Fastify from 'fastify';
import cors from '@fastify/cors';
import 'dotenv/config';
import { registerErrorHandler } from './lib/error-handler.js';
import { getChartConfig, getServerConfig } from './lib/config/chart.js';
import chartPlugin from './plugins/chart.plugin.js';
import { chartsRoutes } from './routes/charts.js';
import { healthRoutes } from './routes/health.js';

const fastify = Fastify({
  logger: true,
});

const serverConfig = getServerConfig();

await fastify.register(cors, {
  origin: serverConfig.corsOrigin,
});

// Rendering defaults are read once; a bad value stops startup
const chartConfig = getChartConfig();
fastify.log.info(
  `Chart defaults: titleWidth=${chartConfig.titleWidth} maxMonthWidth=${chartConfig.maxMonthWidth} resourceTable=${chartConfig.resourceTable}`
);

await fastify.register(chartPlugin, { defaults: chartConfig });

registerErrorHandler(fastify);

await fastify.register(healthRoutes);
await fastify.register(chartsRoutes);

const start = async () => {
  try {
    await fastify.listen({ port: serverConfig.port, host: serverConfig.host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

await start();
