import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { CaptureSummary } from '../domain/model/Capture.js';
import type { Range } from '../domain/model/CaptureReport.js';
import type { DataSource } from '../domain/ports/DataSource.js';
import { toErrorMessage } from '../domain/model/CaptureError.js';
import { CaptureSummarizer } from '../domain/services/CaptureSummarizer.js';
import { ChainCapture } from '../ChainCapture.js';
import { FilePathSource } from '../infrastructure/sources/FilePathSource.js';
import { SerialPortSource } from '../infrastructure/sources/SerialPortSource.js';
import type { SerialPortSourceOptions } from '../infrastructure/sources/SerialPortSource.js';
import { CsvFileSink } from '../infrastructure/sinks/CsvFileSink.js';
import { FirmwareSourceFaultNames } from '../infrastructure/faults/FirmwareSourceFaultNames.js';
import { CaptureCsvParser } from '../infrastructure/parsers/CaptureCsvParser.js';
import { ConsoleReporter } from './ConsoleReporter.js';
import { USAGE, UsageError, parseCliArgs } from './options.js';
import type { CaptureCommand, SummarizeCommand } from './options.js';

const FAULT_SOURCE_FILE = 'AEK_POW_BMS63CHAIN_app_mng.c';

/** Process hooks used by the CLI, replaceable in tests. */
export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly cwd: string;
  /** Register an interrupt handler (SIGINT); returns its removal. */
  readonly onInterrupt: (handler: () => void) => () => void;
  readonly createPort?: SerialPortSourceOptions['createPort'];
}

export const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  cwd: process.cwd(),
  onInterrupt: (handler) => {
    process.on('SIGINT', handler);
    return () => process.off('SIGINT', handler);
  },
};

/** Firmware source with the fault names, looked up under the working directory. */
export function discoverFaultSource(cwd: string): string | undefined {
  const candidates = [join(cwd, 'source', FAULT_SOURCE_FILE), join(cwd, FAULT_SOURCE_FILE)];
  return candidates.find((candidate) => existsSync(candidate));
}

function formatRange(range: Range | undefined): string {
  return range ? `${String(range.min)}..${String(range.max)}` : 'NA';
}

function createSource(command: CaptureCommand, io: CliIo): DataSource {
  if (command.input !== undefined) {
    return new FilePathSource(command.input, { encoding: command.inputEncoding });
  }
  if (command.serialPort !== undefined) {
    return new SerialPortSource(command.serialPort, { baudRate: command.baudRate, createPort: io.createPort });
  }
  throw new UsageError('Exactly one of --input or --serial-port is required');
}

async function runCapture(command: CaptureCommand, io: CliIo): Promise<number> {
  const faultSource = command.faultSource ?? discoverFaultSource(io.cwd);
  const source = createSource(command, io);

  const capture = new ChainCapture({
    errorPolicy: command.strict ? 'strict' : 'lenient',
    faultNames: faultSource === undefined ? undefined : new FirmwareSourceFaultNames(faultSource),
    maxFrames: command.maxFrames,
    durationMs: command.durationMs,
  }).from(source);

  const reporter = new ConsoleReporter({
    write: io.stderr,
    progress: command.progress && source.metadata().kind === 'live',
  });
  reporter.attach(capture);

  if (command.preview !== undefined) {
    const result = await capture.preview(command.preview);
    io.stdout(
      `[INFO] Preview: sampled=${String(result.totalSampled)}, valid=${String(result.accepted.length)}, ` +
        `invalid=${String(result.rejected.length)}, columns=${String(result.columns.length)}\n`,
    );
    return result.accepted.length > 0 ? 0 : 1;
  }

  const output = command.output;
  if (output === undefined) {
    throw new UsageError('--output is required');
  }

  const removeInterrupt = io.onInterrupt(() => {
    if (capture.getStatus().status === 'RUNNING') capture.stop();
  });
  let summary: CaptureSummary;
  try {
    summary = await capture.start(new CsvFileSink(output));
  } finally {
    removeInterrupt();
    reporter.endProgressLine();
  }

  if (summary.status === 'FAILED') return 1;
  if (summary.discardedChars > 0) {
    reporter.line(`[WARN] Dropped ${String(summary.discardedChars)} characters of unterminated data at end of input`);
  }
  if (summary.accepted === 0) {
    reporter.line('[ERROR] No valid frames could be parsed');
    return 1;
  }

  io.stdout(
    `[INFO] Wrote CSV: ${output} (frames=${String(summary.accepted)}, skipped=${String(summary.rejected)})\n`,
  );
  return 0;
}

async function runSummarize(command: SummarizeCommand, io: CliIo): Promise<number> {
  const table = new CaptureCsvParser().parse(await readFile(command.csv, 'utf-8'));
  const report = new CaptureSummarizer(table.columns).summarize(table.rows, {
    chainId: command.chainId,
    deviceId: command.deviceId,
  });

  if (report.devices.length === 0) {
    io.stderr('[ERROR] No rows matched the input/filter conditions\n');
    return 1;
  }
  if (command.json) {
    io.stdout(`${JSON.stringify(report, null, 2)}\n`);
    return 0;
  }

  const lines = ['CHAIN\tDEVICE\tFRAMES\tFIRST\tLAST\tVCELL (V)\tCURRENT (A)\tPACK (V)'];
  for (const device of report.devices) {
    lines.push(
      [
        device.chainId,
        device.deviceId,
        device.frames,
        device.firstFrameIndex,
        device.lastFrameIndex,
        formatRange(device.cellVoltage),
        formatRange(device.current),
        formatRange(device.packVoltage),
      ].join('\t'),
    );
  }
  io.stdout(`${lines.join('\n')}\n`);
  return 0;
}

/** Run the CLI and return its exit code. */
export async function main(argv: readonly string[], io: CliIo = processIo): Promise<number> {
  try {
    const command = parseCliArgs(argv);
    switch (command.command) {
      case 'help':
        io.stdout(`${USAGE}\n`);
        return 0;
      case 'summarize':
        return await runSummarize(command, io);
      case 'capture':
        return await runCapture(command, io);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`[ERROR] ${error.message}\n\n${USAGE}\n`);
    } else {
      io.stderr(`[ERROR] ${toErrorMessage(error)}\n`);
    }
    return 1;
  }
}
