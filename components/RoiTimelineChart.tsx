import React from 'react';
import { Area, AreaChart, CartesianGrid, ReferenceLine, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import { CumulativeSavingsPoint } from '../types';
import { formatInr, formatInrCompact } from '../services/formatters';

interface RoiTimelineChartProps {
  points: readonly CumulativeSavingsPoint[];
  paybackYears: number;
}

const RoiTimelineChart: React.FC<RoiTimelineChartProps> = ({ points, paybackYears }) => (
  <div className="bg-white p-8 rounded-[2.5rem] shadow-sm border border-slate-100">
    <h3 className="text-xl font-black text-slate-900 uppercase tracking-tight flex items-center gap-2">
      <div className="w-2 h-2 bg-green-600 rounded-full"></div>
      Return on Investment Timeline
    </h3>
    <p className="text-xs text-slate-400 font-bold mt-1 mb-8 uppercase tracking-widest">
      {paybackYears > 0
        ? `Break-even after ${paybackYears.toFixed(1)} years`
        : 'Savings never cover the installation cost'}
    </p>

    <div className="h-72 w-full">
      <ResponsiveContainer width="100%" height="100%">
        <AreaChart data={[...points]} margin={{ top: 10, right: 10, left: 10, bottom: 0 }}>
          <CartesianGrid strokeDasharray="6 6" vertical={false} stroke="#f1f5f9" />
          <XAxis
            dataKey="year"
            fontSize={9}
            tick={{fill: '#94a3b8', fontWeight: 800}}
            axisLine={false}
            tickLine={false}
            label={{ value: 'Years', position: 'insideBottomRight', offset: -4, fontSize: 9, fill: '#94a3b8' }}
          />
          <YAxis
            fontSize={9}
            tick={{fill: '#94a3b8', fontWeight: 800}}
            axisLine={false}
            tickLine={false}
            tickFormatter={(v: number) => formatInrCompact(v)}
          />
          <Tooltip
            formatter={(value) => [typeof value === 'number' ? formatInr(value) : String(value), 'Cumulative Savings']}
            labelFormatter={(year) => `Year ${year}`}
          />
          <ReferenceLine y={0} stroke="#ef4444" strokeDasharray="6 4" />
          <Area
            type="monotone"
            dataKey="cumulativeSavings"
            stroke="#16a34a"
            strokeWidth={3}
            fill="#16a34a"
            fillOpacity={0.15}
            dot={{ r: 3, fill: '#16a34a' }}
          />
        </AreaChart>
      </ResponsiveContainer>
    </div>
  </div>
);

export default RoiTimelineChart;
