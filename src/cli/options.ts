import { parseArgs } from 'node:util';
import { toErrorMessage } from '../domain/model/CaptureError.js';
import { parseDuration } from './parseDuration.js';

export const USAGE = `Usage:
  bmscapture (--input <file> | --serial-port <path>) --output <csv> [options]
  bmscapture summarize <csv> [--chain <id>] [--device <id>] [--json]

Capture options:
  --baudrate <n>          Serial baud rate (default: 115200)
  --duration <time>       Stop after a duration: 20s, 5m, 4h or seconds
  --max-frames <n>        Stop after n frames
  --input-encoding <enc>  Encoding of --input (default: utf-8)
  --fault-source <file>   Firmware C source to read fault names from
  --strict                Stop on the first invalid frame
  --no-progress           Do not show live progress
  --preview <n>           Validate the first n frames and write nothing
  --help                  Show this message`;

export interface CaptureCommand {
  readonly command: 'capture';
  readonly input?: string;
  readonly serialPort?: string;
  /** Absent only in preview mode. */
  readonly output?: string;
  readonly baudRate: number;
  readonly inputEncoding: BufferEncoding;
  readonly durationMs?: number;
  readonly maxFrames?: number;
  readonly faultSource?: string;
  readonly strict: boolean;
  readonly progress: boolean;
  readonly preview?: number;
}

export interface SummarizeCommand {
  readonly command: 'summarize';
  readonly csv: string;
  readonly chainId?: number;
  readonly deviceId?: number;
  readonly json: boolean;
}

export interface HelpCommand {
  readonly command: 'help';
}

export type CliCommand = CaptureCommand | SummarizeCommand | HelpCommand;

/** Bad command-line usage. Reported with the usage text. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function positiveInteger(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new UsageError(`--${flag} must be a positive integer, got '${value}'`);
  }
  return Number(value);
}

function integer(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^[+-]?\d+$/.test(value)) {
    throw new UsageError(`--${flag} must be an integer, got '${value}'`);
  }
  return Number(value);
}

function parseSummarize(args: string[]): SummarizeCommand {
  const { values, positionals } = parseArgs({
    args,
    options: {
      chain: { type: 'string' },
      device: { type: 'string' },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
  });

  const [csv, ...extra] = positionals;
  if (csv === undefined || extra.length > 0) {
    throw new UsageError('summarize takes exactly one CSV file');
  }

  return {
    command: 'summarize',
    csv,
    chainId: integer('chain', values.chain),
    deviceId: integer('device', values.device),
    json: values.json === true,
  };
}

function parseCapture(args: string[]): CaptureCommand | HelpCommand {
  const { values, positionals } = parseArgs({
    args,
    options: {
      input: { type: 'string' },
      'serial-port': { type: 'string' },
      output: { type: 'string' },
      baudrate: { type: 'string' },
      duration: { type: 'string' },
      'max-frames': { type: 'string' },
      'input-encoding': { type: 'string', default: 'utf-8' },
      'fault-source': { type: 'string' },
      strict: { type: 'boolean', default: false },
      'no-progress': { type: 'boolean', default: false },
      preview: { type: 'string' },
      help: { type: 'boolean', default: false },
    },
    allowPositionals: true,
  });

  if (values.help === true) return { command: 'help' };
  if (positionals.length > 0) {
    throw new UsageError(`Unexpected argument '${positionals.join(' ')}'`);
  }

  const input = values.input;
  const serialPort = values['serial-port'];
  if ((input === undefined) === (serialPort === undefined)) {
    throw new UsageError('Exactly one of --input or --serial-port is required');
  }

  const preview = positiveInteger('preview', values.preview);
  if (values.output === undefined && preview === undefined) {
    throw new UsageError('--output is required');
  }

  const inputEncoding = values['input-encoding'] ?? 'utf-8';
  if (!Buffer.isEncoding(inputEncoding)) {
    throw new UsageError(`Unknown --input-encoding '${inputEncoding}'`);
  }

  let durationMs: number | undefined;
  if (values.duration !== undefined) {
    try {
      durationMs = parseDuration(values.duration);
    } catch (error) {
      throw new UsageError(toErrorMessage(error));
    }
  }

  return {
    command: 'capture',
    input,
    serialPort,
    output: values.output,
    baudRate: positiveInteger('baudrate', values.baudrate) ?? 115200,
    inputEncoding,
    durationMs,
    maxFrames: positiveInteger('max-frames', values['max-frames']),
    faultSource: values['fault-source'],
    strict: values.strict === true,
    progress: values['no-progress'] !== true,
    preview,
  };
}

/** Parse `process.argv.slice(2)` into a command. */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [first, ...rest] = argv;
  try {
    return first === 'summarize' ? parseSummarize(rest) : parseCapture([...argv]);
  } catch (error) {
    if (error instanceof UsageError) throw error;
    // parseArgs reports unknown or malformed options as TypeErrors.
    throw new UsageError(toErrorMessage(error));
  }
}
