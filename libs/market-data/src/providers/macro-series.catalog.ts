export interface MacroSeriesDefinition {
  seriesId: string;
  name: string;
}

export const MACRO_SERIES: ReadonlyMap<string, MacroSeriesDefinition> = new Map([
  ['cpi', { seriesId: 'CPIAUCSL', name: 'Consumer Price Index' }],
  ['gdp', { seriesId: 'GDP', name: 'Real Gross Domestic Product' }],
  ['unemployment', { seriesId: 'UNRATE', name: 'Unemployment Rate' }],
  ['fedfunds', { seriesId: 'FEDFUNDS', name: 'Federal Funds Rate' }],
  ['pmi', { seriesId: 'PMI', name: 'ISM Manufacturing PMI' }],
]);

export const findMacroSeries = (name: string): MacroSeriesDefinition | null =>
  MACRO_SERIES.get(name.trim().toLowerCase()) ?? null;
