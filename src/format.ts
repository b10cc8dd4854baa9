import { DISPLAY_PRECISION } from './config';
import type { ConversionRecord } from './types';

const PLACEHOLDER = '–';

export function formatOffset(value: number, precision = DISPLAY_PRECISION): string {
  if (!Number.isFinite(value)) {
    return PLACEHOLDER;
  }
  return value.toFixed(precision);
}

export function formatPotential(value: number, precision = DISPLAY_PRECISION): string {
  if (!Number.isFinite(value)) {
    return PLACEHOLDER;
  }
  return `${value.toFixed(precision)} V`;
}

function pad(value: number) {
  return value.toString().padStart(2, '0');
}

export function formatClockTime(timestamp: number): string {
  const date = new Date(timestamp);
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function describeConversion(record: ConversionRecord, precision = DISPLAY_PRECISION): string {
  return (
    `${formatPotential(record.inputPotential, precision)} vs. ${record.fromRef} = ` +
    `${formatPotential(record.result, precision)} vs. ${record.toRef}`
  );
}
