import chalk from 'chalk';
import type { DeviceOutcome, ProgressEvent, RunSummary } from '../orchestrator/progress-events';
import type { RunState } from '../orchestrator/states';
import type { TraceSummary } from '../hardware/trace';

// ── Primitives ──────────────────────────────────────────────────────────

export function formatStep(message: string): string {
  return chalk.cyan(`> ${message}`);
}

export function formatInfo(message: string): string {
  return chalk.gray(`  ${message}`);
}

export function formatSuccess(message: string): string {
  return chalk.green(`  ${message}`);
}

export function formatError(message: string): string {
  return chalk.red(`  ${message}`);
}

export function formatWarning(message: string): string {
  return chalk.yellow(`  ${message}`);
}

// ── Progress events ─────────────────────────────────────────────────────

export function formatTraceSummary(summary: TraceSummary): string {
  return `${summary.points} pts ${summary.startNm}-${summary.stopNm} nm, peak ${summary.maxDbm.toFixed(2)} dBm @ ${summary.peakWavelengthNm} nm`;
}

/** One console line per event; progress ticks stay dim */
export function formatProgressEvent(event: ProgressEvent): string {
  switch (event.type) {
    case 'run_started':
      return formatStep(`Run ${event.runId}${event.runName ? ` (${event.runName})` : ''}: ${event.totalDevices} device(s)`);
    case 'device_started':
      return formatStep(`Device ${event.deviceIndex}: ${event.deviceName}`);
    case 'alignment_progress':
      return formatInfo(`${event.operation} ${event.phase} ${event.percent.toFixed(0)}%`);
    case 'measurement_completed':
      return formatSuccess(`Device ${event.deviceIndex} measured: ${event.powerDbm.toFixed(2)} dBm, ${formatTraceSummary(event.traceSummary)}`);
    case 'error_occurred': {
      const where = event.deviceIndex === null ? 'setup' : `device ${event.deviceIndex}`;
      return formatError(`${event.operation} failed on ${where} [${event.kind}]: ${event.reason}`);
    }
    case 'run_paused':
      return formatWarning(`Paused at device ${event.deviceIndex}`);
    case 'run_resumed':
      return formatWarning(`Resumed at device ${event.deviceIndex}`);
    case 'run_completed':
      return chalk.green.bold('Run completed.');
    case 'run_cancelled':
      return chalk.yellow.bold('Run cancelled.');
    case 'run_failed':
      return chalk.red.bold(`Run failed [${event.code}]: ${event.reason}`);
  }
}

// ── Final result ────────────────────────────────────────────────────────

function formatDevice(device: DeviceOutcome): string {
  const label = `#${device.index} ${device.name}`;
  switch (device.status) {
    case 'measured':
      return formatSuccess(`${label}: ${device.traceSummary ? formatTraceSummary(device.traceSummary) : 'measured'}`);
    case 'failed':
      return formatError(`${label}: ${device.error ?? 'failed'}`);
    case 'pending':
      return formatInfo(`${label}: not measured`);
  }
}

export function formatRunSummary(runId: string, state: RunState, summary: RunSummary): string {
  const lines: string[] = [''];

  lines.push(formatInfo(`Run ID:    ${runId}`));
  lines.push(formatInfo(`State:     ${state}`));
  lines.push(formatInfo(`Measured:  ${summary.measured}/${summary.totalDevices}`));
  if (summary.failed > 0) {
    lines.push(formatWarning(`Failed:    ${summary.failed}`));
  }
  if (summary.durationMs !== undefined) {
    lines.push(formatInfo(`Duration:  ${(summary.durationMs / 1000).toFixed(1)}s`));
  }

  lines.push(...summary.devices.map(formatDevice));
  return lines.join('\n');
}
