import {
  buildScene,
  computeLayout,
  silentLog,
  writeSvg,
} from '../engine/chart/index.js';
import type {
  Chart,
  ChartLayout,
  ChartLog,
  LayoutOptions,
  RandomSource,
  Scene,
  SceneOptions,
} from '../engine/chart/index.js';
import type { ChartConfig } from '../lib/config/chart.js';
import type { RenderOptionsQuery } from '../schemas/chart.schema.js';

export interface RenderOptions extends LayoutOptions, SceneOptions {}

export interface RenderResult {
  layout: ChartLayout;
  scene: Scene;
  svg: string;
}

export class ChartService {
  constructor(private readonly random: RandomSource = Math.random) {}

  /**
   * Merge per-request overrides over the configured defaults.
   */
  resolveOptions(query: RenderOptionsQuery, defaults: ChartConfig): RenderOptions {
    return {
      titleWidth: query.titleWidth ?? defaults.titleWidth,
      maxMonthWidth: query.maxMonthWidth ?? defaults.maxMonthWidth,
      resourceTable: query.resourceTable ?? defaults.resourceTable,
    };
  }

  layout(chart: Chart, options: LayoutOptions, log: ChartLog = silentLog): ChartLayout {
    return computeLayout(chart, options, { random: this.random, log });
  }

  /**
   * Full pipeline: layout, scene, SVG. Nothing is produced if the schedule is invalid.
   */
  render(chart: Chart, options: RenderOptions, log: ChartLog = silentLog): RenderResult {
    const layout = this.layout(chart, options, log);
    const scene = buildScene(layout, { resourceTable: options.resourceTable });
    const svg = writeSvg(scene);

    log.info(`Rendered chart '${chart.title}' at ${scene.width.toFixed(1)}x${scene.height.toFixed(1)}`);

    return { layout, scene, svg };
  }
}

export const chartService = new ChartService();
