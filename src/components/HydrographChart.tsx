import React from 'react';
import { CartesianGrid, Line, LineChart, XAxis, YAxis } from 'recharts';

export interface HydrographPoint {
  time: number;
  value: number;
}

interface HydrographChartProps {
  data: HydrographPoint[];
  yMax: number;
  width: number;
  height: number;
  color?: string;
}

interface TickProps {
  x?: number;
  y?: number;
  payload?: { value: number };
}

// Times are wall-clock values pinned at UTC, so label them in UTC
const MONTH_FORMAT = new Intl.DateTimeFormat('en-US', { month: 'short', timeZone: 'UTC' });

const DAY_MS = 24 * 60 * 60 * 1000;

/** "May" over "05" */
function MonthDayTick({ x = 0, y = 0, payload }: TickProps) {
  const date = new Date(payload?.value ?? 0);
  return (
    <g transform={`translate(${x},${y})`}>
      <text textAnchor="middle" fill="#333" fontSize={11} fontFamily="sans-serif">
        <tspan x={0} dy={12}>{MONTH_FORMAT.format(date)}</tspan>
        <tspan x={0} dy={13}>{String(date.getUTCDate()).padStart(2, '0')}</tspan>
      </text>
    </g>
  );
}

// One tick per midnight inside the plotted range
export function dayTicks(start: number, end: number): number[] {
  const ticks: number[] = [];
  for (let tick = Math.ceil(start / DAY_MS) * DAY_MS; tick <= end; tick += DAY_MS) {
    ticks.push(tick);
  }
  return ticks;
}

/**
 * Static hydrograph for server-side rendering. No ResponsiveContainer and no
 * animation: the markup has to be complete on the first render.
 */
const HydrographChart: React.FC<HydrographChartProps> = ({
  data,
  yMax,
  width,
  height,
  color = '#1f77b4',
}) => {
  const start = data.length > 0 ? data[0].time : 0;
  const end = data.length > 0 ? data[data.length - 1].time : 0;

  return (
    <LineChart width={width} height={height} data={data} margin={{ top: 12, right: 16, bottom: 8, left: 4 }}>
      <CartesianGrid stroke="#d0d0d0" />
      <XAxis
        dataKey="time"
        type="number"
        scale="time"
        domain={[start, end]}
        ticks={dayTicks(start, end)}
        tick={MonthDayTick}
        height={36}
        interval={0}
      />
      <YAxis
        type="number"
        domain={[0, yMax]}
        width={52}
        tick={{ fontSize: 11, fontFamily: 'sans-serif' }}
        tickFormatter={(value: number) => String(Math.round(value * 100) / 100)}
      />
      <Line
        type="linear"
        dataKey="value"
        stroke={color}
        strokeWidth={1.5}
        dot={false}
        isAnimationActive={false}
      />
    </LineChart>
  );
};

export default HydrographChart;
