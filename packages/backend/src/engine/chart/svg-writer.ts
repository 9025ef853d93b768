import type { PathCommand, Scene, SceneNode } from './types.js';

const SVG_NAMESPACE = 'http://www.w3.org/2000/svg';

const XML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => XML_ENTITIES[ch] ?? ch);
}

/** Two decimals at most, no trailing zeros. */
export function formatNumber(value: number): string {
  const rounded = Math.round(value * 100) / 100;
  // Avoid "-0"
  return String(rounded === 0 ? 0 : rounded);
}

function attrs(values: Record<string, string | number>): string {
  return Object.entries(values)
    .map(([key, value]) => {
      const formatted = typeof value === 'number' ? formatNumber(value) : escapeXml(value);
      return ` ${key}="${formatted}"`;
    })
    .join('');
}

export function pathData(commands: readonly PathCommand[]): string {
  return commands
    .map((cmd) =>
      cmd.op === 'moveTo'
        ? `M${formatNumber(cmd.x)},${formatNumber(cmd.y)}`
        : `l${formatNumber(cmd.dx)},${formatNumber(cmd.dy)}`,
    )
    .join(' ');
}

function writeNode(node: SceneNode, indent: string): string[] {
  switch (node.kind) {
    case 'style':
      return [`${indent}<style>`, ...node.rules.map((rule) => `${indent}  ${rule}`), `${indent}</style>`];
    case 'text':
      return [
        `${indent}<text${attrs({ class: node.className, x: node.x, y: node.y })}>${escapeXml(node.text)}</text>`,
      ];
    case 'line':
      return [
        `${indent}<line${attrs({ class: node.className, x1: node.x1, y1: node.y1, x2: node.x2, y2: node.y2 })}/>`,
      ];
    case 'rect':
      return [
        `${indent}<rect${attrs({
          class: node.className,
          x: node.x,
          y: node.y,
          rx: node.radius,
          ry: node.radius,
          width: node.width,
          height: node.height,
        })}/>`,
      ];
    case 'path':
      return [`${indent}<path${attrs({ class: node.className, d: pathData(node.commands) })}/>`];
    case 'group':
      if (node.children.length === 0) {
        return [`${indent}<g${attrs({ id: node.name })}/>`];
      }
      return [
        `${indent}<g${attrs({ id: node.name })}>`,
        ...node.children.flatMap((child) => writeNode(child, `${indent}  `)),
        `${indent}</g>`,
      ];
  }
}

/**
 * Serialize a scene as a standalone SVG document.
 */
export function writeSvg(scene: Scene): string {
  const root = attrs({
    viewBox: `0 0 ${formatNumber(scene.width)} ${formatNumber(scene.height)}`,
    xmlns: SVG_NAMESPACE,
    width: scene.width,
    height: scene.height,
    style: 'background-color: white;',
  });

  return [
    `<svg${root}>`,
    ...scene.children.flatMap((node) => writeNode(node, '  ')),
    '</svg>',
    '',
  ].join('\n');
}
