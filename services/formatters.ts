const numberFormats = new Map<number, Intl.NumberFormat>();

const numberFormat = (fractionDigits: number): Intl.NumberFormat => {
  let format = numberFormats.get(fractionDigits);
  if (!format) {
    format = new Intl.NumberFormat('en-US', {
      minimumFractionDigits: fractionDigits,
      maximumFractionDigits: fractionDigits
    });
    numberFormats.set(fractionDigits, format);
  }
  return format;
};

export const formatNumber = (value: number, fractionDigits = 0): string =>
  numberFormat(fractionDigits).format(value);

export const formatInr = (value: number): string => `₹${formatNumber(value)}`;

export const formatKwh = (value: number): string => `${formatNumber(value)} kWh`;

// Compact axis labels: ₹1.2M, ₹850K
export const formatInrCompact = (value: number): string => {
  const abs = Math.abs(value);
  const sign = value < 0 ? '-' : '';
  if (abs >= 1_000_000) return `${sign}₹${(abs / 1_000_000).toFixed(1)}M`;
  if (abs >= 1_000) return `${sign}₹${(abs / 1_000).toFixed(0)}K`;
  return `${sign}₹${abs.toFixed(0)}`;
};
