export type {
  Chart,
  ChartItem,
  ChartLayout,
  ChartLog,
  ColumnLayout,
  Gutter,
  LayoutOptions,
  RandomSource,
  ResourceStyles,
  RowLayout,
  StyleDescriptor,
  Scene,
  SceneNode,
  SceneOptions,
  PathCommand,
} from './types.js';

export {
  MONTH_NAMES,
  daysInMonth,
  weekendShift,
  skipWeekend,
  addDays,
  diffInDays,
  startOfMonth,
  endOfMonth,
} from './calendar.js';
export { GOLDEN_RATIO_CONJUGATE, hsvToRgb, toHex, resourceHues, assignResourceStyles } from './color.js';
export {
  computeLayout,
  validateChart,
  computeProjectSpan,
  computeColumns,
  shadowDuration,
  gutterWidth,
  gutterHeight,
  silentLog,
} from './layout-engine.js';
export type { LayoutDependencies, ProjectSpan, ColumnSet } from './layout-engine.js';
export { buildScene, canvasWidth, canvasHeight, stylesheet } from './scene-builder.js';
export { writeSvg, escapeXml, formatNumber } from './svg-writer.js';
