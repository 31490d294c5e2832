import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  FirmwareSourceFaultNames,
  extractFaultNames,
} from '../../../src/infrastructure/faults/FirmwareSourceFaultNames.js';
import { FaultNameResolver } from '../../../src/domain/services/FaultNameResolver.js';

const TEST_DIR = join(tmpdir(), 'bmscapture-test-firmwarefaults');

const SOURCE = `
void AEK_POW_BMS63CHAIN_app_init(void)
{
    AEK_POW_BMS63CHAIN_fastDiag[0].AEK_POW_BMS63CHAIN_NOT_PRINTED = 0;
}

void AEK_POW_BMS63CHAIN_app_serialStep_GUI(uint8_t chain)
{
    sendValue(AEK_POW_BMS63CHAIN_fastDiag[dev].AEK_POW_BMS63CHAIN_OV_FLT);
    // sendValue(AEK_POW_BMS63CHAIN_fastDiag[dev].AEK_POW_BMS63CHAIN_COMMENTED);
    sendValue(AEK_POW_BMS63CHAIN_fastDiag[dev].AEK_POW_BMS63CHAIN_UV_FLT); sendValue(AEK_POW_BMS63CHAIN_fastDiag[i + 1].CELL_OPEN);
    sendMessage("ENDData");
    AEK_POW_BMS63CHAIN_fastDiag[dev].AFTER_END = 0;
}
`;

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('extractFaultNames', () => {
  it('should collect fault members from the serial step function in order', () => {
    expect(extractFaultNames(SOURCE)).toEqual([
      'AEK_POW_BMS63CHAIN_OV_FLT',
      'AEK_POW_BMS63CHAIN_UV_FLT',
      'CELL_OPEN',
    ]);
  });

  it('should scan the whole text when the serial step function is absent', () => {
    const text = 'x = AEK_POW_BMS63CHAIN_fastDiag[0].FIRST;\r\ny = AEK_POW_BMS63CHAIN_fastDiag[1].SECOND;\r\n';

    expect(extractFaultNames(text)).toEqual(['FIRST', 'SECOND']);
  });

  it('should return no names for unrelated text', () => {
    expect(extractFaultNames('int main(void) { return 0; }')).toEqual([]);
  });
});

describe('FirmwareSourceFaultNames', () => {
  it('should read names from the source file', async () => {
    const path = join(TEST_DIR, 'app_mng.c');
    writeFileSync(path, SOURCE, 'utf-8');
    const provider = new FirmwareSourceFaultNames(path);

    expect(await provider.names()).toHaveLength(3);
    expect(provider.describe()).toBe(path);
  });

  it('should return no names for a missing file', async () => {
    const provider = new FirmwareSourceFaultNames(join(TEST_DIR, 'missing.c'));

    expect(await provider.names()).toEqual([]);
  });

  it('should fail for a path that cannot be read as a file', async () => {
    const provider = new FirmwareSourceFaultNames(TEST_DIR);

    await expect(provider.names()).rejects.toThrow();
  });

  it('should feed a complete extracted table to the resolver', async () => {
    const lines = Array.from(
      { length: 187 },
      (_, i) => `    sendValue(AEK_POW_BMS63CHAIN_fastDiag[dev].AEK_POW_BMS63CHAIN_FLAG_${String(i + 1)});`,
    );
    const path = join(TEST_DIR, 'full.c');
    writeFileSync(
      path,
      `void AEK_POW_BMS63CHAIN_app_serialStep_GUI(void)\n{\n${lines.join('\n')}\n    sendMessage("ENDData");\n}\n`,
      'utf-8',
    );

    const table = await new FaultNameResolver(new FirmwareSourceFaultNames(path)).resolve();

    expect(table.origin).toBe('extracted');
    expect(table.columns[0]).toBe('fault_001_FLAG_1');
    expect(table.columns[186]).toBe('fault_187_FLAG_187');
  });
});
