// ─── Input ───────────────────────────────────────────────────────────────────

export interface ChartItem {
  title: string;
  /** Nominal duration in days. Absent for milestones. */
  duration?: number;
  /** Index into `Chart.resources`. Inherited from the previous item when absent. */
  resource?: number;
  /** Explicit start, as a UTC-based Date holding the local wall-clock time. */
  startDate?: Date;
  open?: boolean;
}

export interface Chart {
  title: string;
  markedDate?: Date;
  resources: string[];
  items: ChartItem[];
}

export interface LayoutOptions {
  titleWidth: number;
  maxMonthWidth: number;
}

// ─── Geometry ────────────────────────────────────────────────────────────────

export interface Gutter {
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
}

export interface ColumnLayout {
  readonly width: number;
  readonly monthName: string;
}

export interface RowLayout {
  readonly title: string;
  readonly resourceIndex: number;
  readonly offset: number;
  /** Absent for milestones. */
  readonly length?: number;
  readonly open: boolean;
}

export interface StyleDescriptor {
  readonly className: string;
  readonly variant: 'open' | 'closed';
  /** `none` for open tasks. */
  readonly fill: string;
  readonly stroke: string;
  readonly strokeWidth: number;
}

export interface ResourceStyles {
  readonly resourceIndex: number;
  readonly color: string;
  readonly closed: StyleDescriptor;
  readonly open: StyleDescriptor;
}

export interface ChartLayout {
  readonly title: string;
  readonly gutter: Gutter;
  readonly rowGutter: Gutter;
  readonly rowHeight: number;
  readonly resourceGutter: Gutter;
  readonly resourceHeight: number;
  readonly markedDateOffset?: number;
  readonly titleWidth: number;
  readonly maxMonthWidth: number;
  readonly rectCornerRadius: number;
  /** First day of the first month shown. */
  readonly startDate: Date;
  /** Last day of the last month shown. */
  readonly endDate: Date;
  readonly totalDays: number;
  readonly totalWidth: number;
  readonly columns: readonly ColumnLayout[];
  readonly rows: readonly RowLayout[];
  readonly resources: readonly string[];
  readonly resourceStyles: readonly ResourceStyles[];
}

// ─── Scene ───────────────────────────────────────────────────────────────────

export interface StyleNode {
  kind: 'style';
  rules: string[];
}

export interface TextNode {
  kind: 'text';
  className: string;
  x: number;
  y: number;
  text: string;
}

export interface LineNode {
  kind: 'line';
  className: string;
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface RectNode {
  kind: 'rect';
  className: string;
  x: number;
  y: number;
  width: number;
  height: number;
  /** Corner radius, applied on both axes. */
  radius: number;
}

export type PathCommand =
  | { op: 'moveTo'; x: number; y: number }
  | { op: 'lineBy'; dx: number; dy: number };

export interface PathNode {
  kind: 'path';
  className: string;
  commands: PathCommand[];
}

export interface GroupNode {
  kind: 'group';
  name: string;
  children: SceneNode[];
}

export type SceneNode = StyleNode | TextNode | LineNode | RectNode | PathNode | GroupNode;

export interface Scene {
  width: number;
  height: number;
  children: SceneNode[];
}

export interface SceneOptions {
  resourceTable: boolean;
}

// ─── Collaborators ───────────────────────────────────────────────────────────

/** Returns a value in [0, 1). */
export type RandomSource = () => number;

export interface ChartLog {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
