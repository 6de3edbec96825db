import fs from 'node:fs/promises';
import path from 'node:path';
import { createElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import sharp from 'sharp';
import { Reading } from '@/types/gage';
import HydrographChart, { HydrographPoint } from '@/components/HydrographChart';
import { DAY_MS } from '@/lib/wallClock';

// Extra room at top of hydrographs. 1.05 -> 5% extra room above max
export const GRAPH_TOP_BUFFER = 1.05;
export const GRAPH_WIDTH = 576;
export const GRAPH_HEIGHT = 384;

export interface HydrographData {
  points: HydrographPoint[];
  yMax: number;
}

/**
 * Points within `windowDays` of the last timestamp, minus non-numeric values.
 * The y-axis runs from zero to 5% above the highest point.
 */
export function prepareHydrograph(series: Reading[], windowDays: number): HydrographData {
  if (series.length === 0) return { points: [], yMax: 1 };

  const last = series[series.length - 1].timestamp.getTime();
  const window = windowDays * DAY_MS;
  const points: HydrographPoint[] = [];
  for (const reading of series) {
    const time = reading.timestamp.getTime();
    if (last - time > window) continue;
    if (typeof reading.value !== 'number' || !Number.isFinite(reading.value)) continue;
    points.push({ time, value: reading.value });
  }

  const maxValue = points.reduce((max, point) => Math.max(max, point.value), -Infinity);
  // A flat-zero or all-negative window still needs a non-empty axis
  const yMax = maxValue > 0 ? maxValue * GRAPH_TOP_BUFFER : 1;
  return { points, yMax };
}

/** Standalone SVG document for the chart. */
export function hydrographSvg(data: HydrographData): string {
  const markup = renderToStaticMarkup(createElement(HydrographChart, {
    data: data.points,
    yMax: data.yMax,
    width: GRAPH_WIDTH,
    height: GRAPH_HEIGHT,
  }));

  const start = markup.indexOf('<svg');
  const end = markup.lastIndexOf('</svg>');
  if (start === -1 || end === -1) {
    throw new Error('Chart rendered without an <svg> element');
  }

  const svg = markup.slice(start, end + '</svg>'.length);
  return svg.includes('xmlns=') ? svg : svg.replace('<svg', '<svg xmlns="http://www.w3.org/2000/svg"');
}

export class HydrographRenderer {
  /**
   * Plot the last `windowDays` of `series` to a PNG at `outputPath`.
   * @returns false, writing nothing, when no point falls in the window
   */
  async render(series: Reading[], windowDays: number, outputPath: string): Promise<boolean> {
    const data = prepareHydrograph(series, windowDays);
    if (data.points.length === 0) {
      console.warn(`[GRAPH] No data to plot for ${path.basename(outputPath)}`);
      return false;
    }

    const png = await sharp(Buffer.from(hydrographSvg(data)))
      .flatten({ background: '#ffffff' })
      .png()
      .toBuffer();

    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, png);
    return true;
  }
}
