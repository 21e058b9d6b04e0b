import React, { useState, useMemo, useRef } from 'react';
import { Estimate, EstimatorDraft, EstimatorField } from './types';
import EstimatorForm from './components/EstimatorForm';
import MetricCards from './components/MetricCards';
import PotentialGauge from './components/PotentialGauge';
import RoiTimelineChart from './components/RoiTimelineChart';
import MonthlyOutputChart from './components/MonthlyOutputChart';
import FinancialSummaryTable from './components/FinancialSummaryTable';
import SolarTips from './components/SolarTips';
import { estimate } from './services/solarEstimator';
import { defaultDraft, validateEstimatorDraft } from './services/inputValidation';
import { solarPotentialScore } from './services/solarPotential';
import { buildFinancialSummary, buildHeadlineMetrics, buildMonthlyBreakdown } from './services/financialSummary';
import { createAnalysisGate, requestAnalysis } from './services/analysisRequests';

type Tab = 'basic' | 'advanced' | 'tips';

const TABS: { id: Tab; label: string; icon: string }[] = [
  { id: 'basic', label: 'Basic Analysis', icon: 'fa-house' },
  { id: 'advanced', label: 'Advanced Metrics', icon: 'fa-chart-column' },
  { id: 'tips', label: 'Tips & Info', icon: 'fa-lightbulb' },
];

const App: React.FC = () => {
  const [activeTab, setActiveTab] = useState<Tab>('basic');
  const [draft, setDraft] = useState<EstimatorDraft>(defaultDraft);
  const [errors, setErrors] = useState<string[]>([]);
  const [current, setCurrent] = useState<Estimate | null>(null);
  const [aiAnalysis, setAiAnalysis] = useState<string | null>(null);
  const [isAnalyzing, setIsAnalyzing] = useState(false);
  const analysisGate = useRef(createAnalysisGate());

  const discardAnalysis = () => {
    analysisGate.current.invalidate();
    setAiAnalysis(null);
    setIsAnalyzing(false);
  };

  const handleChange = (field: EstimatorField, value: string) => {
    setDraft(prev => ({ ...prev, [field]: value }));
  };

  const handleCalculate = () => {
    const validation = validateEstimatorDraft(draft);
    setErrors(validation.errors);
    discardAnalysis();
    if (!validation.input) {
      setCurrent(null);
      return;
    }
    setCurrent({ input: validation.input, result: estimate(validation.input) });
  };

  const handleAnalyze = async () => {
    if (!current) return;
    setIsAnalyzing(true);
    const text = await requestAnalysis(analysisGate.current, current);
    if (text === null) return;
    setAiAnalysis(text);
    setIsAnalyzing(false);
  };

  const metrics = useMemo(() => (current ? buildHeadlineMetrics(current.result) : []), [current]);
  const monthly = useMemo(
    () => (current ? buildMonthlyBreakdown(current.result, current.input.tariffPerKwh) : []),
    [current]
  );
  const summary = useMemo(() => (current ? buildFinancialSummary(current.input, current.result) : []), [current]);
  const score = current ? solarPotentialScore(current.result.annualOutputKwh, current.input.rooftopAreaM2) : 0;

  return (
    <div className="min-h-screen bg-slate-50 pb-24 font-sans antialiased">
      <header className="bg-white/80 backdrop-blur-xl border-b border-slate-200 sticky top-0 z-40">
        <div className="max-w-7xl mx-auto px-6 h-20 flex items-center justify-between">
          <div className="flex items-center gap-3">
            <div className="bg-slate-900 p-2.5 rounded-2xl shadow-lg">
              <i className="fa-solid fa-sun text-yellow-400 text-xl"></i>
            </div>
            <div>
              <h1 className="text-xl font-black text-slate-900 tracking-tighter leading-none">Solar Energy Potential Estimator</h1>
              <p className="text-[10px] font-bold text-orange-600 uppercase tracking-widest mt-1">Output · Savings · Payback</p>
            </div>
          </div>

          {current && (
            <button onClick={() => {
              setDraft(defaultDraft());
              setErrors([]);
              setCurrent(null);
              discardAnalysis();
              setActiveTab('basic');
            }} className="group w-10 h-10 rounded-full flex items-center justify-center bg-slate-100 text-slate-400 hover:text-red-600 hover:bg-red-50 transition-all shadow-sm">
              <i className="fa-solid fa-rotate-left group-hover:rotate-[-90deg] transition-transform"></i>
            </button>
          )}
        </div>
      </header>

      <main className="max-w-7xl mx-auto px-6 mt-10 space-y-10">
        <p className="text-center text-lg text-slate-500 font-medium max-w-2xl mx-auto">
          Discover your solar power potential, savings, and return on investment.
        </p>

        <nav className="flex flex-wrap justify-center gap-3 bg-white p-1.5 rounded-2xl border border-slate-100 w-fit mx-auto">
          {TABS.map(tab => (
            <button
              key={tab.id}
              onClick={() => setActiveTab(tab.id)}
              className={`px-5 py-2 rounded-xl text-[11px] font-black uppercase tracking-widest transition-all ${
                activeTab === tab.id
                  ? 'bg-slate-900 text-white shadow-sm'
                  : 'text-slate-400 hover:text-slate-600'
              }`}
            >
              <i className={`fa-solid ${tab.icon} mr-2`}></i>
              {tab.label}
            </button>
          ))}
        </nav>

        {activeTab === 'basic' && (
          <div className="space-y-10">
            <EstimatorForm draft={draft} errors={errors} onChange={handleChange} onCalculate={handleCalculate} />

            {current && (
              <>
                <MetricCards metrics={metrics} />
                <div className="grid grid-cols-1 lg:grid-cols-2 gap-10">
                  <PotentialGauge score={score} />
                  <RoiTimelineChart
                    points={current.result.cumulativeSavingsByYear}
                    paybackYears={current.result.paybackYears}
                  />
                </div>
              </>
            )}
          </div>
        )}

        {activeTab === 'advanced' && (
          current ? (
            <div className="space-y-10">
              <MonthlyOutputChart breakdown={monthly} />
              <FinancialSummaryTable rows={summary} />

              <div className="bg-white p-8 rounded-[2.5rem] shadow-sm border border-slate-100">
                <div className="flex items-center justify-between gap-4">
                  <h3 className="text-xl font-black text-slate-900 uppercase tracking-tight flex items-center gap-2">
                    <i className="fa-solid fa-wand-magic-sparkles text-indigo-500"></i>
                    AI Review
                  </h3>
                  <button
                    onClick={() => { void handleAnalyze(); }}
                    disabled={isAnalyzing}
                    className="px-5 py-2 bg-indigo-600 hover:bg-indigo-700 disabled:opacity-50 text-white font-bold text-sm rounded-xl transition-all"
                  >
                    {isAnalyzing ? 'Analyzing…' : 'Review my estimate'}
                  </button>
                </div>
                {aiAnalysis && (
                  <p className="mt-6 whitespace-pre-line text-sm text-slate-700 font-medium leading-relaxed">{aiAnalysis}</p>
                )}
              </div>
            </div>
          ) : (
            <div className="max-w-3xl mx-auto text-center py-24 bg-white rounded-[3.5rem] shadow-sm border border-slate-100 px-12">
              <i className="fa-solid fa-chart-column text-4xl text-orange-500 mb-6"></i>
              <p className="text-lg text-slate-500 font-medium">
                Run a calculation on the Basic Analysis tab to see the monthly breakdown and financial summary.
              </p>
            </div>
          )
        )}

        {activeTab === 'tips' && <SolarTips />}
      </main>

      <footer className="max-w-7xl mx-auto px-6 mt-16 pt-8 border-t border-slate-200 text-center text-slate-500">
        <p className="font-bold">Start your solar journey today and contribute to a sustainable future!</p>
        <p className="text-xs mt-1">Calculations are estimates. Consult with solar professionals for detailed assessments.</p>
      </footer>
    </div>
  );
};

export default App;
