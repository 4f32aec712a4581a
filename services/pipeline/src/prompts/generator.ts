import { addDays } from '../dates';
import type { Table } from '../table/table';
import { toDailySeries, type DailySeries } from './series';
import {
  FORECAST_TABLE_HEADER,
  renderFineTuningInstruction,
  renderForecastTable,
  renderHistoryTable,
  renderZeroShotInstruction
} from './templates';

export interface PromptRecord {
  Prompt: string;
  Completion: string;
}

export interface PromptWindowOptions {
  locationName: string;
  parameter: string;
  historyDays: number;
  forecastDays: number;
}

export interface ZeroShotOptions extends PromptWindowOptions {
  /** Anchor used when the location has no daily values at all. */
  fallbackEndDate?: string;
}

export interface FineTuningOptions extends PromptWindowOptions {
  maxPerLocation?: number | null;
}

export interface LocationPrompts {
  zeroShot: PromptRecord[];
  fineTuning: PromptRecord[];
}

/**
 * Always one record. History covers the `historyDays` calendar days ending at the latest
 * daily value; days without data inside that span are simply absent from the table.
 */
export function createZeroShotPrompt(series: DailySeries, options: ZeroShotOptions): PromptRecord {
  const latest = series.length > 0 ? series[series.length - 1]?.date : undefined;
  const historyEnd = latest ?? options.fallbackEndDate ?? new Date().toISOString().slice(0, 10);
  const historyStart = addDays(historyEnd, -(options.historyDays - 1));
  const forecastStart = addDays(historyEnd, 1);
  const forecastEnd = addDays(forecastStart, options.forecastDays - 1);

  const history = series.filter((entry) => entry.date >= historyStart && entry.date <= historyEnd);

  return {
    Prompt: renderZeroShotInstruction({
      locationName: options.locationName,
      parameter: options.parameter,
      historyStart,
      historyEnd,
      historyTable: renderHistoryTable(history),
      forecastStart,
      forecastEnd
    }),
    Completion: FORECAST_TABLE_HEADER
  };
}

/**
 * One record per window position over consecutive daily values, oldest first. Fewer
 * than `historyDays + forecastDays` values yields nothing.
 */
export function createFineTuningPrompts(series: DailySeries, options: FineTuningOptions): PromptRecord[] {
  const { historyDays, forecastDays } = options;
  if (series.length < historyDays + forecastDays) {
    return [];
  }

  const records: PromptRecord[] = [];
  for (let index = historyDays; index <= series.length - forecastDays; index += 1) {
    if (options.maxPerLocation && records.length >= options.maxPerLocation) {
      break;
    }
    const history = series.slice(index - historyDays, index);
    const target = series.slice(index, index + forecastDays);
    records.push({
      Prompt: renderFineTuningInstruction({
        locationName: options.locationName,
        parameter: options.parameter,
        historyTable: renderHistoryTable(history)
      }),
      Completion: renderForecastTable(target)
    });
  }
  return records;
}

export function generateLocationPrompts(table: Table, options: ZeroShotOptions & FineTuningOptions): LocationPrompts {
  const series = toDailySeries(table, { locationName: options.locationName, parameter: options.parameter });
  return {
    zeroShot: [createZeroShotPrompt(series, options)],
    fineTuning: createFineTuningPrompts(series, options)
  };
}
