import { ValidationError } from '../errors.js';

export interface ChartConfig {
  titleWidth: number;
  maxMonthWidth: number;
  resourceTable: boolean;
}

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigin: string;
}

export const DEFAULT_CHART_CONFIG: Readonly<ChartConfig> = Object.freeze({
  titleWidth: 210,
  maxMonthWidth: 80,
  resourceTable: false,
});

let cachedConfig: ChartConfig | undefined;

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative number, got '${raw}'`, {
      variable: name,
    });
  }
  return value;
}

function readBoolean(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ValidationError(`${name} must be a boolean, got '${raw}'`, { variable: name });
  }
}

/**
 * Read the chart rendering defaults from the environment.
 * Unset variables fall back to DEFAULT_CHART_CONFIG; malformed ones throw ValidationError.
 */
export function getChartConfig(): ChartConfig {
  if (cachedConfig !== undefined) {
    return cachedConfig;
  }

  const config: ChartConfig = {
    titleWidth: readNumber('CHART_TITLE_WIDTH', DEFAULT_CHART_CONFIG.titleWidth),
    maxMonthWidth: readNumber('CHART_MAX_MONTH_WIDTH', DEFAULT_CHART_CONFIG.maxMonthWidth),
    resourceTable: readBoolean('CHART_RESOURCE_TABLE', DEFAULT_CHART_CONFIG.resourceTable),
  };

  cachedConfig = config;
  return config;
}

export function getServerConfig(): ServerConfig {
  const port = readNumber('PORT', 3000);
  if (!Number.isInteger(port) || port > 65535) {
    throw new ValidationError(`PORT must be an integer between 0 and 65535, got '${port}'`);
  }

  return {
    port,
    host: process.env.HOST || '0.0.0.0',
    corsOrigin: process.env.CORS_ORIGIN || '*',
  };
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetChartConfigCache(): void {
  cachedConfig = undefined;
}
