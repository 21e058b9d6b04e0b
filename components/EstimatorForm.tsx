import React, { useState } from 'react';
import { EstimatorDraft, EstimatorField, InputFieldSpec } from '../types';
import { INPUT_FIELDS } from '../constants';

interface EstimatorFormProps {
  draft: EstimatorDraft;
  errors: string[];
  onChange: (field: EstimatorField, value: string) => void;
  onCalculate: () => void;
}

const FieldControl: React.FC<{ spec: InputFieldSpec; value: string; onChange: (value: string) => void }> = ({ spec, value, onChange }) => (
  <label className="block">
    <span className="flex items-center gap-2 text-[10px] font-black text-slate-500 uppercase tracking-widest mb-2">
      <i className={`fa-solid ${spec.icon} text-orange-500`}></i>
      {spec.label} ({spec.unit})
    </span>
    {spec.control === 'slider' ? (
      <div className="flex items-center gap-4">
        <input
          type="range"
          min={spec.min}
          max={spec.max}
          step={spec.step}
          value={value}
          onChange={e => onChange(e.target.value)}
          className="flex-1 accent-orange-500"
        />
        <span className="w-14 text-right text-sm font-black text-slate-900 tabular-nums">{value}</span>
      </div>
    ) : (
      <input
        type="number"
        min={spec.min}
        max={spec.max}
        step={spec.step}
        value={value}
        onChange={e => onChange(e.target.value)}
        className="w-full px-4 py-3 rounded-xl border border-slate-200 bg-white font-bold text-slate-900 focus:outline-none focus:ring-2 focus:ring-orange-300"
      />
    )}
    <span className="block text-xs text-slate-400 font-medium mt-1">{spec.help}</span>
  </label>
);

const EstimatorForm: React.FC<EstimatorFormProps> = ({ draft, errors, onChange, onCalculate }) => {
  const [showAdvanced, setShowAdvanced] = useState(false);
  const basicFields = INPUT_FIELDS.filter(f => !f.advanced);
  const advancedFields = INPUT_FIELDS.filter(f => f.advanced);

  return (
    <div className="bg-slate-50 rounded-[2.5rem] p-8 border border-slate-100 shadow-sm">
      <h3 className="text-xl font-black text-slate-900 uppercase tracking-tight flex items-center gap-2 mb-8">
        <i className="fa-solid fa-sliders text-orange-500"></i>
        System Configuration
      </h3>

      <div className="grid grid-cols-1 md:grid-cols-3 gap-6">
        {basicFields.map(spec => (
          <FieldControl key={spec.field} spec={spec} value={draft[spec.field]} onChange={v => onChange(spec.field, v)} />
        ))}
      </div>

      <div className="mt-8 border-t border-slate-200 pt-6">
        <button
          onClick={() => setShowAdvanced(prev => !prev)}
          className="flex items-center gap-2 text-[10px] font-black text-slate-500 uppercase tracking-widest hover:text-slate-800"
        >
          <i className={`fa-solid fa-chevron-right transition-transform ${showAdvanced ? 'rotate-90' : ''}`}></i>
          Advanced Settings
        </button>
        {showAdvanced && (
          <div className="grid grid-cols-1 md:grid-cols-2 gap-6 mt-6">
            {advancedFields.map(spec => (
              <FieldControl key={spec.field} spec={spec} value={draft[spec.field]} onChange={v => onChange(spec.field, v)} />
            ))}
          </div>
        )}
      </div>

      {errors.length > 0 && (
        <div className="mt-8 bg-red-50 border border-red-100 text-red-700 rounded-2xl p-5">
          <p className="font-black uppercase tracking-widest text-[10px] mb-1">Check your inputs</p>
          <ul className="list-disc pl-5 space-y-1 text-sm font-bold">
            {errors.map((err, idx) => (
              <li key={idx}>{err}</li>
            ))}
          </ul>
        </div>
      )}

      <button
        onClick={onCalculate}
        className="mt-8 w-full bg-gradient-to-r from-orange-500 to-yellow-400 text-white font-black py-5 rounded-[2rem] shadow-xl shadow-orange-200 transition-all transform hover:-translate-y-1"
      >
        <i className="fa-solid fa-magnifying-glass mr-2"></i>
        Calculate Solar Potential
      </button>
    </div>
  );
};

export default EstimatorForm;
