import { gutterHeight } from './layout-engine.js';
import type {
  ChartLayout,
  GroupNode,
  LineNode,
  PathNode,
  RectNode,
  RowLayout,
  Scene,
  SceneNode,
  SceneOptions,
  StyleDescriptor,
  TextNode,
} from './types.js';

export const BASE_STYLES: readonly string[] = [
  '.outer-lines{stroke-width:3;stroke:#aaaaaa;}',
  '.inner-lines{stroke-width:2;stroke:#dddddd;}',
  '.item{font-family:Arial;font-size:12pt;dominant-baseline:middle;}',
  '.resource{font-family:Arial;font-size:12pt;text-anchor:end;dominant-baseline:middle;}',
  '.title{font-family:Arial;font-size:18pt;}',
  '.heading{font-family:Arial;font-size:16pt;dominant-baseline:middle;text-anchor:middle;}',
  '.task-heading{dominant-baseline:middle;text-anchor:start;}',
  '.milestone{fill:black;stroke-width:1;stroke:black;}',
  '.marker{stroke-width:2;stroke:#888888;stroke-dasharray:7;}',
];

const TITLE_Y = 25;
const MARKER_OVERHANG = 5;
/** Horizontal pitch of the resource legend entries. */
const LEGEND_COLUMN_WIDTH = 100;
const LEGEND_LABEL_GAP = 5;

export function styleRule(style: StyleDescriptor): string {
  return `.${style.className}{fill:${style.fill};stroke-width:${style.strokeWidth};stroke:${style.stroke};}`;
}

export function stylesheet(layout: ChartLayout): string[] {
  return [
    ...BASE_STYLES,
    ...layout.resourceStyles.flatMap((styles) => [styleRule(styles.closed), styleRule(styles.open)]),
  ];
}

// ─── Canvas ──────────────────────────────────────────────────────────────────

export function canvasWidth(layout: ChartLayout): number {
  return (
    layout.gutter.left +
    layout.titleWidth +
    layout.columns.reduce((sum, col) => sum + col.width, 0) +
    layout.gutter.right
  );
}

/** Height of the chart body: header gutter plus one band per row. */
function bodyBottom(layout: ChartLayout): number {
  return layout.gutter.top + layout.rows.length * layout.rowHeight;
}

export function canvasHeight(layout: ChartLayout, options: SceneOptions): number {
  const legend = options.resourceTable
    ? gutterHeight(layout.resourceGutter) + layout.resourceHeight
    : 0;
  return bodyBottom(layout) + legend + layout.gutter.bottom;
}

// ─── Node helpers ────────────────────────────────────────────────────────────

function text(className: string, x: number, y: number, content: string): TextNode {
  return { kind: 'text', className, x, y, text: content };
}

function line(className: string, x1: number, y1: number, x2: number, y2: number): LineNode {
  return { kind: 'line', className, x1, y1, x2, y2 };
}

function group(name: string, children: SceneNode[]): GroupNode {
  return { kind: 'group', name, children };
}

/** Baseline for the month names and the "Tasks" heading. */
function headingY(layout: ChartLayout): number {
  return layout.gutter.top - layout.rowGutter.bottom - layout.rowHeight / 2;
}

// ─── Sections ────────────────────────────────────────────────────────────────

function buildColumns(layout: ChartLayout): GroupNode {
  const children: SceneNode[] = [];
  const bottom = bodyBottom(layout);
  let x = layout.gutter.left + layout.titleWidth;

  for (let i = 0; i <= layout.columns.length; i++) {
    children.push(line('inner-lines', x, layout.gutter.top, x, bottom));

    if (i < layout.columns.length) {
      const column = layout.columns[i];
      children.push(text('heading', x + layout.maxMonthWidth / 2, headingY(layout), column.monthName));
      x += column.width;
    }
  }

  return group('columns', children);
}

function taskBar(layout: ChartLayout, row: RowLayout, length: number, y: number): RectNode {
  const styles = layout.resourceStyles[row.resourceIndex];
  const style = row.open ? styles.open : styles.closed;

  return {
    kind: 'rect',
    className: style.className,
    x: row.offset,
    y: y + layout.rowGutter.top,
    width: length,
    height: layout.rowHeight - gutterHeight(layout.rowGutter),
    radius: layout.rectCornerRadius,
  };
}

function milestone(layout: ChartLayout, row: RowLayout, y: number): PathNode {
  const n = (layout.rowHeight - gutterHeight(layout.rowGutter)) / 2;

  return {
    kind: 'path',
    className: 'milestone',
    commands: [
      { op: 'moveTo', x: row.offset - n, y: y + layout.rowGutter.top + n },
      { op: 'lineBy', dx: n, dy: -n },
      { op: 'lineBy', dx: n, dy: n },
      { op: 'lineBy', dx: -n, dy: n },
      { op: 'lineBy', dx: -n, dy: -n },
    ],
  };
}

function buildRows(layout: ChartLayout, width: number): GroupNode {
  const children: SceneNode[] = [];
  const count = layout.rows.length;

  for (let i = 0; i <= count; i++) {
    const y = layout.gutter.top + i * layout.rowHeight;
    const className = i === 0 || i === count ? 'outer-lines' : 'inner-lines';

    children.push(line(className, layout.gutter.left, y, width - layout.gutter.right, y));

    if (i < count) {
      const row = layout.rows[i];

      children.push(
        text(
          'item',
          layout.gutter.left + layout.rowGutter.left,
          y + layout.rowGutter.top + layout.rowHeight / 2,
          row.title,
        ),
      );
      children.push(
        row.length !== undefined ? taskBar(layout, row, row.length, y) : milestone(layout, row, y),
      );
    }
  }

  return group('rows', children);
}

function buildMarker(layout: ChartLayout, offset: number): LineNode {
  return line(
    'marker',
    offset,
    layout.gutter.top - MARKER_OVERHANG,
    offset,
    bodyBottom(layout) + MARKER_OVERHANG,
  );
}

function buildLegend(layout: ChartLayout): GroupNode {
  const y = bodyBottom(layout);
  const side = layout.resourceHeight - gutterHeight(layout.resourceGutter);

  const children = layout.resources.flatMap((label, i): SceneNode[] => {
    const x = layout.resourceGutter.left + (i + 1) * LEGEND_COLUMN_WIDTH;

    return [
      text('resource', x - LEGEND_LABEL_GAP, y + layout.resourceHeight / 2, label),
      {
        kind: 'rect',
        className: layout.resourceStyles[i].closed.className,
        x: x + LEGEND_LABEL_GAP,
        y: y + layout.resourceGutter.top,
        width: side,
        height: side,
        radius: layout.rectCornerRadius,
      },
    ];
  });

  return group('resources', children);
}

/**
 * Turn a computed layout into drawing primitives, in document order:
 * stylesheet, title, month columns, task heading, rows, then the optional
 * date marker and resource legend.
 */
export function buildScene(layout: ChartLayout, options: SceneOptions): Scene {
  const width = canvasWidth(layout);
  const height = canvasHeight(layout, options);

  const children: SceneNode[] = [
    { kind: 'style', rules: stylesheet(layout) },
    text('title', layout.gutter.left, TITLE_Y, layout.title),
    buildColumns(layout),
    text('heading task-heading', layout.gutter.left + layout.rowGutter.left, headingY(layout), 'Tasks'),
    buildRows(layout, width),
  ];

  if (layout.markedDateOffset !== undefined) {
    children.push(buildMarker(layout, layout.markedDateOffset));
  }

  if (options.resourceTable) {
    children.push(buildLegend(layout));
  }

  return { width, height, children };
}
