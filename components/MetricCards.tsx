import React from 'react';
import { HeadlineMetric } from '../types';

interface MetricCardsProps {
  metrics: HeadlineMetric[];
}

const MetricCards: React.FC<MetricCardsProps> = ({ metrics }) => (
  <div className="grid grid-cols-1 sm:grid-cols-2 lg:grid-cols-4 gap-6">
    {metrics.map(metric => (
      <div
        key={metric.id}
        className="bg-gradient-to-br from-indigo-500 to-purple-700 text-white rounded-[2rem] p-6 shadow-lg shadow-indigo-200"
      >
        <div className="flex items-center gap-2 mb-3">
          <i className={`fa-solid ${metric.icon} text-yellow-300`}></i>
          <span className="text-[10px] font-black uppercase tracking-widest opacity-80">{metric.label}</span>
        </div>
        <p className="text-2xl font-black tracking-tight">{metric.value}</p>
        <p className="text-xs font-bold mt-1 opacity-70">{metric.delta}</p>
      </div>
    ))}
  </div>
);

export default MetricCards;
