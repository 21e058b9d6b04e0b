import React from 'react';
import { SummaryRow } from '../types';

interface FinancialSummaryTableProps {
  rows: SummaryRow[];
}

const FinancialSummaryTable: React.FC<FinancialSummaryTableProps> = ({ rows }) => (
  <div className="bg-white p-8 rounded-[2.5rem] shadow-sm border border-slate-100">
    <h3 className="text-xl font-black text-slate-900 uppercase tracking-tight flex items-center gap-2 mb-6">
      <div className="w-2 h-2 bg-blue-600 rounded-full"></div>
      Financial Summary
    </h3>
    <table className="w-full text-sm">
      <thead>
        <tr className="text-[10px] font-black text-slate-400 uppercase tracking-widest text-left">
          <th className="pb-3">Parameter</th>
          <th className="pb-3 text-right">Value</th>
        </tr>
      </thead>
      <tbody>
        {rows.map(row => (
          <tr key={row.parameter} className="border-t border-slate-50">
            <td className="py-3 font-bold text-slate-600">{row.parameter}</td>
            <td className="py-3 font-black text-slate-900 text-right tabular-nums">{row.value}</td>
          </tr>
        ))}
      </tbody>
    </table>
  </div>
);

export default FinancialSummaryTable;
