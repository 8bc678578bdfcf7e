import { err, ok } from '../core/result';
import type { Result } from '../core/result';
import type { Trace } from './types';

export interface TraceSummary {
  points: number;
  startNm: number;
  stopNm: number;
  minDbm: number;
  maxDbm: number;
  meanDbm: number;
  peakWavelengthNm: number;
}

/** Reduce a spectral trace to the figures reported with a measurement */
export function summarizeTrace(trace: Trace): Result<TraceSummary> {
  const { wavelengthNm, powerDbm } = trace;
  if (wavelengthNm.length === 0) return err('trace is empty');
  if (wavelengthNm.length !== powerDbm.length) {
    return err(`trace length mismatch: ${wavelengthNm.length} wavelengths, ${powerDbm.length} power samples`);
  }

  let peak = { index: 0, dbm: -Infinity };
  let minDbm = Infinity;
  let startNm = Infinity;
  let stopNm = -Infinity;
  let sum = 0;
  powerDbm.forEach((dbm, i) => {
    const nm = wavelengthNm[i] ?? Number.NaN;
    if (dbm > peak.dbm) peak = { index: i, dbm };
    minDbm = Math.min(minDbm, dbm);
    startNm = Math.min(startNm, nm);
    stopNm = Math.max(stopNm, nm);
    sum += dbm;
  });

  return ok({
    points: wavelengthNm.length,
    startNm,
    stopNm,
    minDbm,
    maxDbm: peak.dbm,
    meanDbm: sum / powerDbm.length,
    peakWavelengthNm: wavelengthNm[peak.index] ?? Number.NaN,
  });
}
