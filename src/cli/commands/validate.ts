import { Command } from 'commander';
import { readRunPlan } from '../../config/run-config';
import type { DeviceDescriptor, RunPlan } from '../../config/run-config';
import { formatError, formatInfo, formatSuccess } from '../formatters';

type ValidateCommandOptions = {
  json?: boolean;
};

function describeDevice(device: DeviceDescriptor, index: number): string {
  const { x, y, z } = device.position;
  const position = z === undefined ? `(${x}, ${y})` : `(${x}, ${y}, ${z})`;
  const alignment = device.alignment ? `, align ${device.alignment.mode} ±${device.alignment.searchRangeUm} um` : '';
  return `#${index} ${device.name} @ ${position}${alignment}, sweep ${device.sweep.startNm}-${device.sweep.stopNm} nm`;
}

export function renderPlan(plan: RunPlan): string[] {
  const lines = [formatSuccess(`Plan is valid: ${plan.devices.length} device(s)`)];
  if (plan.runName) lines.push(formatInfo(`name: ${plan.runName}`));
  lines.push(...plan.devices.map((device, index) => formatInfo(describeDevice(device, index))));
  return lines;
}

export function registerValidateCommand(program: Command): void {
  program
    .command('validate <plan>')
    .description('Check a run plan without touching the instruments')
    .option('--json', 'Print the normalised plan as JSON', false)
    .action((planPath: string, options: ValidateCommandOptions) => {
      const plan = readRunPlan(planPath);
      if (!plan.ok) {
        console.error(formatError(plan.error));
        process.exitCode = 1;
        return;
      }

      if (options.json) {
        console.log(JSON.stringify(plan.value, null, 2));
        return;
      }
      renderPlan(plan.value).forEach((line) => console.log(line));
    });
}
