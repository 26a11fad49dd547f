import { parseArgs } from 'util';
import { MAX_TIMEOUT_MS, isValidTimeout } from './config';
import { DistanceService } from './services/distance-service';
import { isDistanceUnit } from './types/geo';
import type { DistanceUnit } from './types/geo';
import { InvalidUsageError, isGeocodeError, toError } from './utils/errors';
import { createLogger } from './utils/logger';
import type { Logger } from './utils/logger';

export const USAGE = [
  'Usage: city-distance [OPTIONS] PLACE-A PLACE-B',
  '       city-distance [ --help ]',
  '',
  'Find the distance between two places.',
  '',
  'Options:',
  '  --unit km|miles   Unit to display distance (default: km)',
  '  --timeout MS      Give up on the lookups after MS milliseconds, 0 to wait forever',
  '                    (default: GEOCODER_TIMEOUT or 10000)',
  '  --help            Print usage'
].join('\n');

const OPTIONS = {
  unit: { type: 'string' },
  timeout: { type: 'string' },
  help: { type: 'boolean', short: 'h' }
} as const;

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'usage'; error: InvalidUsageError }
  | { kind: 'measure'; placeA: string; placeB: string; unit: DistanceUnit; timeoutMs?: number };

const usage = (message: string): CliCommand => ({ kind: 'usage', error: new InvalidUsageError(message) });

/**
 * One validation pass over the arguments. `--help` wins over anything else
 * on the command line.
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    options: OPTIONS,
    allowPositionals: true,
    strict: false
  });

  if (values.help === true) {
    return { kind: 'help' };
  }

  const unknown = Object.keys(values).find(key => !Object.prototype.hasOwnProperty.call(OPTIONS, key));
  if (unknown) {
    return usage(`Unknown option --${unknown}`);
  }

  const unit = values.unit ?? 'km';
  if (typeof unit !== 'string' || !isDistanceUnit(unit)) {
    return usage('--unit must be either km or miles');
  }

  let timeoutMs: number | undefined;
  if (values.timeout !== undefined) {
    if (typeof values.timeout !== 'string' || !/^\d+$/.test(values.timeout)) {
      return usage('--timeout must be a whole number of milliseconds');
    }
    timeoutMs = parseInt(values.timeout, 10);
    if (!isValidTimeout(timeoutMs)) {
      return usage(`--timeout must be at most ${MAX_TIMEOUT_MS} milliseconds`);
    }
  }

  if (positionals.length < 2) {
    return usage('Two places are required');
  }

  // Extra leading positionals are ignored; the last two are the places
  const [placeA, placeB] = positionals.slice(-2);
  return { kind: 'measure', placeA, placeB, unit, timeoutMs };
}

export interface CliDeps {
  service?: Pick<DistanceService, 'measure'>;
  stdout?: (line: string) => void;
  logger?: Logger;
}

/**
 * Runs the command line and resolves to the process exit code:
 * 0 on success or --help, 1 on bad usage, 2 when the lookup fails.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? (line => process.stdout.write(line + '\n'));
  const logger = deps.logger ?? createLogger('cli');
  const command = parseCliArgs(argv);

  switch (command.kind) {
    case 'help':
      stdout(USAGE);
      return 0;
    case 'usage':
      logger.error(command.error.message);
      stdout(USAGE);
      return 1;
  }

  const service = deps.service ?? new DistanceService();
  try {
    const report = await service.measure(command.placeA, command.placeB, command.unit, {
      timeoutMs: command.timeoutMs
    });
    stdout(report.distance.toFixed(6));
    return 0;
  } catch (error) {
    if (isGeocodeError(error)) {
      logger.error(`${error.code}: ${error.message}`);
    } else {
      logger.error('Unexpected failure', toError(error));
    }
    return 2;
  }
}
