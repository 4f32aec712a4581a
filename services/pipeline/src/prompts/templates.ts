import type { DailySeries } from './series';

export const HISTORY_TABLE_HEADER = '| Date       | Value (µg/m³) |\n|------------|---------------|\n';
export const FORECAST_TABLE_HEADER = '| Date       | Predicted Value (µg/m³) |\n|------------|-------------------------|';

/**
 * Two decimals, ties to even. `toFixed` already rounds on the exact binary value, so
 * only exact ties differ; those are the odd multiples of 1/8 (x.125, x.375, ...).
 */
export function formatTwoDecimals(value: number): string {
  const isTie = Number.isInteger(value * 8) && !Number.isInteger(value * 4);
  if (!isTie) {
    return value.toFixed(2);
  }
  const exact = value.toFixed(3);
  const hundredths = Number(exact.charAt(exact.length - 2));
  return hundredths % 2 === 0 ? exact.slice(0, -1) : value.toFixed(2);
}

function renderRows(series: DailySeries): string {
  return series.map((entry) => `| ${entry.date} | ${formatTwoDecimals(entry.value)} |`).join('\n');
}

export function renderHistoryTable(series: DailySeries): string {
  return `${HISTORY_TABLE_HEADER}${renderRows(series)}`;
}

export function renderForecastTable(series: DailySeries): string {
  return `${FORECAST_TABLE_HEADER}\n${renderRows(series)}`;
}

function preamble(locationName: string, parameter: string): string {
  return (
    `You are an advanced forecasting system tasked with predicting daily air quality for ${locationName}.\n` +
    `The data includes daily mean values for '${parameter}' (in µg/m³).\n\n`
  );
}

export function renderZeroShotInstruction(input: {
  locationName: string;
  parameter: string;
  historyStart: string;
  historyEnd: string;
  historyTable: string;
  forecastStart: string;
  forecastEnd: string;
}): string {
  return (
    preamble(input.locationName, input.parameter) +
    `### Historical Data (from ${input.historyStart} to ${input.historyEnd}):\n` +
    `${input.historyTable}\n\n` +
    '### Instructions:\n' +
    `1. Forecast daily mean '${input.parameter}' for each day from ${input.forecastStart} to ${input.forecastEnd}.\n` +
    '2. Provide output as a table:\n' +
    FORECAST_TABLE_HEADER
  );
}

export function renderFineTuningInstruction(input: {
  locationName: string;
  parameter: string;
  historyTable: string;
}): string {
  return (
    preamble(input.locationName, input.parameter) +
    `### Historical Data:\n${input.historyTable}\n\n` +
    '### Instructions:\n' +
    `1. Forecast daily mean '${input.parameter}' for each day.\n` +
    '2. Provide output as a table:\n' +
    FORECAST_TABLE_HEADER
  );
}
