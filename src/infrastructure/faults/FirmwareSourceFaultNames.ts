import { readFile } from 'node:fs/promises';
import type { FaultNameProvider } from '../../domain/ports/FaultNameProvider.js';

const SERIAL_STEP_BODY =
  /void\s+AEK_POW_BMS63CHAIN_app_serialStep_GUI\s*\([^)]*\)\s*\{([\s\S]*?)sendMessage\("ENDData"\)/;
const FAST_DIAG_MEMBER = /AEK_POW_BMS63CHAIN_fastDiag\[[^\]]+\]\.([A-Za-z0-9_]+)/g;

/**
 * Extract fault flag names from firmware C source, in the order the serial
 * step function prints them.
 *
 * Only the body of the GUI serial step function is scanned when it can be
 * found. Lines commented out with `//` are skipped.
 */
export function extractFaultNames(sourceText: string): string[] {
  const body = SERIAL_STEP_BODY.exec(sourceText)?.[1] ?? sourceText;
  const names: string[] = [];

  for (const line of body.split(/\r?\n/)) {
    if (line.trimStart().startsWith('//')) continue;
    for (const match of line.matchAll(FAST_DIAG_MEMBER)) {
      const name = match[1];
      if (name) names.push(name);
    }
  }
  return names;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Fault-name provider backed by the firmware's application manager source file. Node.js only. */
export class FirmwareSourceFaultNames implements FaultNameProvider {
  constructor(private readonly filePath: string) {}

  async names(): Promise<readonly string[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
    return extractFaultNames(text);
  }

  describe(): string {
    return this.filePath;
  }
}
