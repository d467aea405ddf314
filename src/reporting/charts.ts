import { writeFileSync } from 'node:fs';
import { Resvg } from '@resvg/resvg-js';

// Charts are assembled as SVG markup and rasterized to PNG.

export interface BarDatum {
  label: string;
  value: number;
}

export interface LineSeries {
  label: string;
  points: { x: string; y: number }[];
}

export interface HeatmapData {
  rows: string[];
  columns: string[];
  /** values[row][column]; null marks an empty cell. */
  values: (number | null)[][];
}

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

export const CHART_WIDTH = 1200;
const PANEL_HEIGHT = 420;
const MARGIN = { top: 50, right: 40, bottom: 50, left: 110 };
const POSITIVE = '#2e7d32';
const NEGATIVE = '#c62828';
const PALETTE = [
  '#1f77b4',
  '#ff7f0e',
  '#2ca02c',
  '#d62728',
  '#9467bd',
  '#8c564b',
  '#e377c2',
  '#7f7f7f',
  '#bcbd22',
  '#17becf',
];
const MAX_LEGEND_ENTRIES = 10;

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function fmt(n: number): string {
  return n.toFixed(1);
}

export function linearScale(
  [d0, d1]: [number, number],
  [r0, r1]: [number, number],
): (value: number) => number {
  const lo = d0 === d1 ? d0 - 1 : d0;
  const hi = d0 === d1 ? d1 + 1 : d1;
  return (value) => r0 + ((value - lo) / (hi - lo)) * (r1 - r0);
}

function text(x: number, y: number, content: string, attrs = ''): string {
  return `<text x="${fmt(x)}" y="${fmt(y)}" font-family="sans-serif" font-size="12"${
    attrs ? ` ${attrs}` : ''
  }>${escapeXml(content)}</text>`;
}

function plotArea(box: Box): Box {
  return {
    x: box.x + MARGIN.left,
    y: box.y + MARGIN.top,
    width: box.width - MARGIN.left - MARGIN.right,
    height: box.height - MARGIN.top - MARGIN.bottom,
  };
}

function panelTitle(box: Box, title: string): string {
  return text(box.x + box.width / 2, box.y + 28, title, 'font-size="16" text-anchor="middle"');
}

function emptyPanel(box: Box, title: string): string[] {
  return [
    panelTitle(box, title),
    text(box.x + box.width / 2, box.y + box.height / 2, 'No data', 'text-anchor="middle"'),
  ];
}

// ── Panels ────────────────────────────────────────────────────────────

export function barPanel(box: Box, title: string, data: BarDatum[]): string[] {
  if (data.length === 0) return emptyPanel(box, title);

  const plot = plotArea(box);
  const values = data.map((d) => d.value);
  const sx = linearScale(
    [Math.min(0, ...values), Math.max(0, ...values)],
    [plot.x, plot.x + plot.width],
  );
  const rowHeight = plot.height / data.length;
  const zero = sx(0);

  const parts = [panelTitle(box, title)];
  data.forEach((d, i) => {
    const y = plot.y + i * rowHeight;
    const end = sx(d.value);
    parts.push(
      `<rect x="${fmt(Math.min(zero, end))}" y="${fmt(y + rowHeight * 0.15)}" width="${fmt(
        Math.abs(end - zero),
      )}" height="${fmt(rowHeight * 0.7)}" fill="${d.value >= 0 ? POSITIVE : NEGATIVE}"/>`,
    );
    parts.push(text(plot.x - 6, y + rowHeight / 2 + 4, d.label, 'text-anchor="end"'));
  });
  parts.push(
    `<line x1="${fmt(zero)}" y1="${fmt(plot.y)}" x2="${fmt(zero)}" y2="${fmt(
      plot.y + plot.height,
    )}" stroke="#333"/>`,
  );
  parts.push(
    text(plot.x, plot.y + plot.height + 20, String(Math.round(Math.min(0, ...values)))),
    text(
      plot.x + plot.width,
      plot.y + plot.height + 20,
      String(Math.round(Math.max(0, ...values))),
      'text-anchor="end"',
    ),
  );
  return parts;
}

export function linePanel(box: Box, title: string, series: LineSeries[]): string[] {
  const xs = [...new Set(series.flatMap((s) => s.points.map((p) => p.x)))].sort();
  if (xs.length === 0) return emptyPanel(box, title);

  const plot = plotArea(box);
  const ys = series.flatMap((s) => s.points.map((p) => p.y));
  const yMin = Math.min(...ys);
  const yMax = Math.max(...ys);
  const xIndex = new Map(xs.map((x, i) => [x, i]));
  const sx = linearScale([0, Math.max(xs.length - 1, 1)], [plot.x, plot.x + plot.width]);
  const sy = linearScale([yMin, yMax], [plot.y + plot.height, plot.y]);

  const parts = [
    panelTitle(box, title),
    `<rect x="${fmt(plot.x)}" y="${fmt(plot.y)}" width="${fmt(plot.width)}" height="${fmt(
      plot.height,
    )}" fill="none" stroke="#ccc"/>`,
  ];

  series.forEach((s, i) => {
    const color = PALETTE[i % PALETTE.length];
    const points = s.points
      .map((p) => `${fmt(sx(xIndex.get(p.x) ?? 0))},${fmt(sy(p.y))}`)
      .join(' ');
    parts.push(`<polyline points="${points}" fill="none" stroke="${color}" stroke-width="1.5"/>`);
    if (i < MAX_LEGEND_ENTRIES) {
      const ly = plot.y + 14 + i * 16;
      parts.push(
        `<rect x="${fmt(plot.x + 8)}" y="${fmt(ly - 9)}" width="10" height="10" fill="${color}"/>`,
        text(plot.x + 22, ly, s.label),
      );
    }
  });

  parts.push(
    text(plot.x - 6, plot.y + plot.height, String(Math.round(yMin)), 'text-anchor="end"'),
    text(plot.x - 6, plot.y + 10, String(Math.round(yMax)), 'text-anchor="end"'),
    text(plot.x, plot.y + plot.height + 20, xs[0]),
    text(plot.x + plot.width, plot.y + plot.height + 20, xs[xs.length - 1], 'text-anchor="end"'),
  );
  return parts;
}

export function heatmapPanel(box: Box, title: string, data: HeatmapData): string[] {
  if (data.rows.length === 0 || data.columns.length === 0) return emptyPanel(box, title);

  const plot = plotArea(box);
  const cellWidth = plot.width / data.columns.length;
  const cellHeight = plot.height / data.rows.length;
  const maxAbs = Math.max(
    1,
    ...data.values.flatMap((row) => row.map((v) => (v == null ? 0 : Math.abs(v)))),
  );

  const parts = [panelTitle(box, title)];
  data.rows.forEach((label, r) => {
    const y = plot.y + r * cellHeight;
    parts.push(text(plot.x - 6, y + cellHeight / 2 + 4, label, 'text-anchor="end"'));
    data.columns.forEach((_, c) => {
      const value = data.values[r]?.[c] ?? null;
      const fill = value == null ? '#f0f0f0' : value >= 0 ? POSITIVE : NEGATIVE;
      const opacity = value == null ? 1 : 0.15 + 0.85 * (Math.abs(value) / maxAbs);
      parts.push(
        `<rect x="${fmt(plot.x + c * cellWidth)}" y="${fmt(y)}" width="${fmt(
          cellWidth,
        )}" height="${fmt(cellHeight)}" fill="${fill}" fill-opacity="${opacity.toFixed(
          2,
        )}" stroke="#fff"/>`,
      );
    });
  });
  parts.push(
    text(plot.x, plot.y + plot.height + 20, data.columns[0]),
    text(
      plot.x + plot.width,
      plot.y + plot.height + 20,
      data.columns[data.columns.length - 1],
      'text-anchor="end"',
    ),
  );
  return parts;
}

// ── Documents ─────────────────────────────────────────────────────────

/** Stacks panels vertically into one SVG document. */
export function composeSvg(
  panels: Array<(box: Box) => string[]>,
  panelHeight = PANEL_HEIGHT,
): string {
  const height = panelHeight * Math.max(panels.length, 1);
  const body = panels.flatMap((draw, i) =>
    draw({ x: 0, y: i * panelHeight, width: CHART_WIDTH, height: panelHeight }),
  );
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${CHART_WIDTH}" height="${height}" viewBox="0 0 ${CHART_WIDTH} ${height}">`,
    `<rect width="100%" height="100%" fill="#fff"/>`,
    ...body,
    '</svg>',
  ].join('\n');
}

export function renderPng(svg: string): Buffer {
  const resvg = new Resvg(svg, {
    fitTo: { mode: 'width', value: CHART_WIDTH },
    font: { loadSystemFonts: true, defaultFontFamily: 'sans-serif' },
  });
  return resvg.render().asPng();
}

export function writePng(path: string, svg: string): void {
  writeFileSync(path, renderPng(svg));
}
