import React from 'react';
import { PolarAngleAxis, RadialBar, RadialBarChart, ResponsiveContainer } from 'recharts';
import { POTENTIAL_REFERENCE_SCORE, POTENTIAL_THRESHOLD_SCORE } from '../constants';
import { potentialBand, potentialBandColor, potentialBandLabel } from '../services/solarPotential';

interface PotentialGaugeProps {
  score: number;
}

const PotentialGauge: React.FC<PotentialGaugeProps> = ({ score }) => {
  const band = potentialBand(score);
  const delta = score - POTENTIAL_REFERENCE_SCORE;

  return (
    <div className="bg-white p-8 rounded-[2.5rem] shadow-sm border border-slate-100">
      <h3 className="text-xl font-black text-slate-900 uppercase tracking-tight flex items-center gap-2">
        <div className="w-2 h-2 bg-orange-500 rounded-full"></div>
        Solar Potential Score
      </h3>

      <div className="relative h-56 w-full">
        <ResponsiveContainer width="100%" height="100%">
          <RadialBarChart
            data={[{ name: 'score', value: score, fill: potentialBandColor[band] }]}
            startAngle={180}
            endAngle={0}
            innerRadius="70%"
            outerRadius="100%"
            cy="80%"
          >
            <PolarAngleAxis type="number" domain={[0, 100]} tick={false} />
            <RadialBar dataKey="value" background={{ fill: '#f1f5f9' }} cornerRadius={12} />
          </RadialBarChart>
        </ResponsiveContainer>
        <div className="absolute inset-x-0 bottom-6 flex flex-col items-center">
          <span className="text-5xl font-black text-slate-900 tracking-tighter">{score.toFixed(0)}</span>
          <span className={`text-[10px] font-black uppercase tracking-widest ${delta >= 0 ? 'text-green-600' : 'text-rose-500'}`}>
            {delta >= 0 ? '▲' : '▼'} {Math.abs(delta).toFixed(0)} vs reference
          </span>
        </div>
      </div>

      <div className="mt-4 flex flex-wrap justify-center gap-x-6 gap-y-2 border-t border-slate-50 pt-4">
        <span className="text-[10px] font-black text-slate-500 uppercase tracking-widest">
          {potentialBandLabel[band]}
        </span>
        <span className="text-[10px] font-black text-slate-400 uppercase tracking-widest">
          Target: {POTENTIAL_THRESHOLD_SCORE}+ {score >= POTENTIAL_THRESHOLD_SCORE ? '✓' : ''}
        </span>
      </div>
    </div>
  );
};

export default PotentialGauge;
