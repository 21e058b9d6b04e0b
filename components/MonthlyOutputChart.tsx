import React, { useMemo, useState } from 'react';
import { CartesianGrid, Tooltip, ResponsiveContainer, BarChart, Bar, Cell, XAxis, YAxis } from 'recharts';
import { MonthlyBreakdown } from '../types';
import { formatInr, formatKwh } from '../services/formatters';

type Metric = 'output' | 'savings';

const metricLabel: Record<Metric, string> = {
  'output': 'Energy Output (kWh)',
  'savings': 'Savings (₹)',
};

interface MonthlyOutputChartProps {
  breakdown: MonthlyBreakdown[];
}

const MonthlyOutputChart: React.FC<MonthlyOutputChartProps> = ({ breakdown }) => {
  const [metric, setMetric] = useState<Metric>('output');

  const peakMonth = useMemo(() => {
    if (breakdown.length === 0) return null;
    return breakdown.reduce((best, m) => (m.output > best.output ? m : best), breakdown[0]);
  }, [breakdown]);

  return (
    <div className="bg-white p-8 rounded-[2.5rem] shadow-sm border border-slate-100 transition-all">
      <div className="flex flex-col md:flex-row justify-between items-start md:items-center gap-4 mb-10">
        <div>
          <h3 className="text-xl font-black text-slate-900 uppercase tracking-tight flex items-center gap-2">
            <div className="w-2 h-2 bg-orange-500 rounded-full"></div>
            Monthly Energy Production Estimate
          </h3>
          <p className="text-xs text-slate-400 font-bold mt-1 uppercase tracking-widest">
            {metricLabel[metric]}
            {peakMonth && <span className="ml-2 text-orange-500">• Peak in {peakMonth.monthName}</span>}
          </p>
        </div>

        <div className="flex flex-wrap items-center gap-3 bg-slate-50 p-1.5 rounded-2xl border border-slate-100">
          <span className="text-[9px] font-black text-slate-400 uppercase tracking-widest ml-2 mr-1">Show:</span>
          {(['output', 'savings'] as const).map(m => (
            <button
              key={m}
              onClick={() => setMetric(m)}
              className={`px-4 py-1.5 rounded-xl text-[10px] font-bold uppercase transition-all ${
                metric === m
                  ? 'bg-white text-orange-600 shadow-sm border border-slate-200'
                  : 'text-slate-400 hover:text-slate-600'
              }`}
            >
              {m === 'output' ? 'kWh' : '₹'}
            </button>
          ))}
        </div>
      </div>

      <div className="h-80 w-full">
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={breakdown} margin={{ top: 10, right: 10, left: 0, bottom: 0 }}>
            <CartesianGrid strokeDasharray="6 6" vertical={false} stroke="#f1f5f9" />
            <XAxis
              dataKey="monthName"
              fontSize={9}
              tick={{fill: '#94a3b8', fontWeight: 800}}
              axisLine={false}
              tickLine={false}
            />
            <YAxis
              fontSize={9}
              tick={{fill: '#94a3b8', fontWeight: 800}}
              axisLine={false}
              tickLine={false}
            />
            <Tooltip
              cursor={{fill: '#f8fafc'}}
              content={({ active, label }) => {
                const month = breakdown.find(m => m.monthName === label);
                if (!active || !month) return null;
                return (
                  <div style={{
                    borderRadius: '24px',
                    border: '1px solid #f1f5f9',
                    boxShadow: '0 20px 25px -5px rgb(0 0 0 / 0.1)',
                    padding: '20px',
                    background: 'white',
                    minWidth: '180px'
                  }}>
                    <p style={{ fontWeight: 900, color: '#0f172a', fontSize: '13px', marginBottom: '12px', textTransform: 'uppercase' }}>
                      {label}
                    </p>
                    <div style={{ display: 'flex', flexDirection: 'column', gap: '6px' }}>
                      <div style={{ display: 'flex', justifyContent: 'space-between', alignItems: 'center' }}>
                        <span style={{ fontWeight: 700, fontSize: '12px', color: '#64748b' }}>Output</span>
                        <span style={{ fontWeight: 800, fontSize: '13px', color: '#f97316' }}>
                          {formatKwh(month.output)}
                        </span>
                      </div>
                      <div style={{ display: 'flex', justifyContent: 'space-between', alignItems: 'center' }}>
                        <span style={{ fontWeight: 700, fontSize: '12px', color: '#64748b' }}>Savings</span>
                        <span style={{ fontWeight: 800, fontSize: '13px', color: '#0f172a' }}>
                          {formatInr(month.savings)}
                        </span>
                      </div>
                    </div>
                  </div>
                );
              }}
            />
            <Bar dataKey={metric} radius={[6, 6, 0, 0]}>
              {breakdown.map((entry, index) => (
                <Cell
                  key={`cell-${index}`}
                  fill={metric === 'output' ? '#f97316' : '#10b981'}
                  fillOpacity={peakMonth && entry.monthName === peakMonth.monthName ? 1 : 0.75}
                />
              ))}
            </Bar>
          </BarChart>
        </ResponsiveContainer>
      </div>
    </div>
  );
};

export default MonthlyOutputChart;
