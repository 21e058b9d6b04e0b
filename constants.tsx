import { InputFieldSpec, IrradianceRegion, TipSection } from './types';

// Output is scaled linearly against a 20% reference panel
export const REFERENCE_PANEL_EFFICIENCY_PCT = 20;

// kg CO2 avoided per kWh of grid electricity displaced
export const CO2_KG_PER_KWH = 0.82;

export const DAYS_PER_YEAR = 365;

// Extra years plotted past the payback year on the ROI timeline
export const ROI_TIMELINE_EXTRA_YEARS = 4;
export const MIN_ROI_TIMELINE_YEARS = 5;

export const LIFETIME_YEARS = 25;

export const MONTH_LABELS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// Relative yield per month (Jan-Dec). Sums to 12.1, not 12: the skew is intentional.
export const SEASONAL_FACTORS = [0.8, 0.9, 1.1, 1.2, 1.3, 1.2, 1.1, 1.1, 1.0, 0.9, 0.8, 0.7];

export const POTENTIAL_REFERENCE_SCORE = 50;
export const POTENTIAL_THRESHOLD_SCORE = 90;

export const INPUT_FIELDS: InputFieldSpec[] = [
  {
    field: 'rooftopAreaM2',
    label: 'Rooftop Area',
    unit: 'm²',
    icon: 'fa-house',
    help: 'Available rooftop space for solar panels',
    min: 10,
    max: 1000,
    step: 1,
    defaultValue: 100,
    control: 'number',
    advanced: false
  },
  {
    field: 'irradianceKwhPerM2PerDay',
    label: 'Solar Irradiance',
    unit: 'kWh/m²/day',
    icon: 'fa-sun',
    help: 'Daily solar energy received per square meter',
    min: 3.0,
    max: 7.0,
    step: 0.1,
    defaultValue: 5.5,
    control: 'slider',
    advanced: false
  },
  {
    field: 'tariffPerKwh',
    label: 'Electricity Tariff',
    unit: '₹/kWh',
    icon: 'fa-bolt',
    help: 'Current electricity rate you pay',
    min: 3.0,
    max: 15.0,
    step: 0.1,
    defaultValue: 6.5,
    control: 'number',
    advanced: false
  },
  {
    field: 'panelEfficiencyPct',
    label: 'Panel Efficiency',
    unit: '%',
    icon: 'fa-solar-panel',
    help: 'Rated conversion efficiency of the panels',
    min: 15,
    max: 25,
    step: 1,
    defaultValue: 20,
    control: 'slider',
    advanced: true
  },
  {
    field: 'systemLossesPct',
    label: 'System Losses',
    unit: '%',
    icon: 'fa-plug-circle-minus',
    help: 'Inverter, wiring, soiling and temperature losses',
    min: 10,
    max: 25,
    step: 1,
    defaultValue: 15,
    control: 'slider',
    advanced: true
  },
  {
    field: 'installationCostPerKw',
    label: 'Installation Cost',
    unit: '₹/kW',
    icon: 'fa-screwdriver-wrench',
    help: 'Installed cost per kW of system size',
    min: 40000,
    max: 80000,
    step: 1000,
    defaultValue: 65000,
    control: 'number',
    advanced: true
  },
  {
    field: 'annualMaintenanceCost',
    label: 'Annual Maintenance',
    unit: '₹',
    icon: 'fa-broom',
    help: 'Cleaning, inspections and servicing per year',
    min: 2000,
    max: 8000,
    step: 500,
    defaultValue: 4000,
    control: 'number',
    advanced: true
  }
];

// ============ Reference content (Tips & Info tab) ============

export const IRRADIANCE_REGIONS: IrradianceRegion[] = [
  { region: 'Rajasthan', irradiance: 6.2, potential: 'Excellent' },
  { region: 'Gujarat', irradiance: 5.8, potential: 'Excellent' },
  { region: 'Karnataka', irradiance: 5.5, potential: 'Very Good' },
  { region: 'Andhra Pradesh', irradiance: 5.4, potential: 'Very Good' },
  { region: 'Tamil Nadu', irradiance: 5.2, potential: 'Good' },
  { region: 'Maharashtra', irradiance: 5.0, potential: 'Good' },
  { region: 'Punjab', irradiance: 4.8, potential: 'Good' },
  { region: 'Haryana', irradiance: 4.6, potential: 'Moderate' }
];

export const SOLAR_TIPS: TipSection[] = [
  {
    id: 'conditions',
    title: 'Optimal Conditions',
    icon: 'fa-house-chimney',
    tips: [
      { heading: 'Roof Direction', detail: 'South-facing roofs are ideal' },
      { heading: 'Tilt Angle', detail: '15-30° for maximum efficiency' },
      { heading: 'Shading', detail: 'Minimize shadows from trees/buildings' },
      { heading: 'Roof Age', detail: 'Ensure roof can support panels for 25+ years' }
    ]
  },
  {
    id: 'financial',
    title: 'Financial Benefits',
    icon: 'fa-sack-dollar',
    tips: [
      { heading: 'Government Subsidies', detail: 'Up to 40% subsidy available' },
      { heading: 'Net Metering', detail: 'Sell excess power back to grid' },
      { heading: 'Tax Benefits', detail: 'Depreciation advantages for businesses' },
      { heading: 'Property Value', detail: 'Increases property value by 3-4%' }
    ]
  },
  {
    id: 'environment',
    title: 'Environmental Impact',
    icon: 'fa-seedling',
    tips: [
      { heading: 'Carbon Footprint', detail: 'Typical system saves 1-2 tons CO₂/year' },
      { heading: 'Energy Independence', detail: 'Reduce dependence on fossil fuels' },
      { heading: 'Clean Energy', detail: 'Zero emissions during operation' },
      { heading: 'Sustainability', detail: '25-30 year lifespan' }
    ]
  },
  {
    id: 'technical',
    title: 'Technical Considerations',
    icon: 'fa-microchip',
    tips: [
      { heading: 'Panel Types', detail: 'Monocrystalline, Polycrystalline, Thin-film' },
      { heading: 'Inverters', detail: 'String vs. Power optimizers vs. Microinverters' },
      { heading: 'Monitoring', detail: 'Track system performance remotely' },
      { heading: 'Maintenance', detail: 'Minimal - mostly cleaning and inspections' }
    ]
  }
];
