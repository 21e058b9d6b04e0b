import React from 'react';
import { IRRADIANCE_REGIONS, SOLAR_TIPS } from '../constants';
import { IrradianceRegion } from '../types';

const potentialBadge: Record<IrradianceRegion['potential'], string> = {
  'Excellent': 'bg-green-200 text-green-800',
  'Very Good': 'bg-lime-200 text-lime-800',
  'Good': 'bg-blue-200 text-blue-800',
  'Moderate': 'bg-amber-200 text-amber-800',
};

const SolarTips: React.FC = () => (
  <div className="space-y-10">
    <div className="grid grid-cols-1 md:grid-cols-2 gap-6">
      {SOLAR_TIPS.map(section => (
        <div key={section.id} className="bg-white rounded-[2rem] p-6 border border-slate-100 shadow-sm">
          <h4 className="text-sm font-black text-slate-900 uppercase tracking-tight flex items-center gap-2 mb-4">
            <i className={`fa-solid ${section.icon} text-orange-500`}></i>
            {section.title}
          </h4>
          <ul className="space-y-2 text-sm text-slate-600 font-medium">
            {section.tips.map(tip => (
              <li key={tip.heading}>
                <strong className="text-slate-800">{tip.heading}:</strong> {tip.detail}
              </li>
            ))}
          </ul>
        </div>
      ))}
    </div>

    <div className="bg-white p-8 rounded-[2.5rem] shadow-sm border border-slate-100">
      <h3 className="text-xl font-black text-slate-900 uppercase tracking-tight flex items-center gap-2 mb-6">
        <i className="fa-solid fa-map-location-dot text-orange-500"></i>
        India Solar Irradiance Guide
      </h3>
      <table className="w-full text-sm">
        <thead>
          <tr className="text-[10px] font-black text-slate-400 uppercase tracking-widest text-left">
            <th className="pb-3">Region</th>
            <th className="pb-3 text-right">Average Irradiance (kWh/m²/day)</th>
            <th className="pb-3 text-right">Potential</th>
          </tr>
        </thead>
        <tbody>
          {IRRADIANCE_REGIONS.map(r => (
            <tr key={r.region} className="border-t border-slate-50">
              <td className="py-3 font-bold text-slate-700">{r.region}</td>
              <td className="py-3 font-black text-slate-900 text-right tabular-nums">{r.irradiance.toFixed(1)}</td>
              <td className="py-3 text-right">
                <span className={`text-[9px] font-black uppercase px-2 py-0.5 rounded-full ${potentialBadge[r.potential]}`}>
                  {r.potential}
                </span>
              </td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  </div>
);

export default SolarTips;
