import type { FaultNameProvider } from '../ports/FaultNameProvider.js';
import type { FaultNameTable } from '../model/FaultNameTable.js';
import { extractedFaultTable, fallbackFaultTable } from '../model/FaultNameTable.js';
import { FAULT_COUNT } from '../model/FrameLayout.js';
import { toErrorMessage } from '../model/CaptureError.js';

/**
 * Resolves fault column names once per run.
 *
 * Resolution never fails: a missing provider, a provider error or a name
 * count other than the fault cardinality all yield the generated
 * `fault_001`…`fault_NNN` table, with the cause kept in `note`.
 */
export class FaultNameResolver {
  private resolution: Promise<FaultNameTable> | null = null;

  constructor(
    private readonly provider?: FaultNameProvider,
    private readonly faultCount: number = FAULT_COUNT,
  ) {}

  resolve(): Promise<FaultNameTable> {
    this.resolution ??= this.resolveOnce();
    return this.resolution;
  }

  private async resolveOnce(): Promise<FaultNameTable> {
    const provider = this.provider;
    if (!provider) {
      return fallbackFaultTable('No fault-name source configured', this.faultCount);
    }

    let names: readonly string[];
    try {
      names = await provider.names();
    } catch (error) {
      return fallbackFaultTable(
        `Could not read fault names from ${provider.describe()}: ${toErrorMessage(error)}`,
        this.faultCount,
      );
    }

    if (names.length !== this.faultCount) {
      return fallbackFaultTable(
        `Found ${String(names.length)} fault names in ${provider.describe()}, expected ${String(this.faultCount)}`,
        this.faultCount,
      );
    }

    return extractedFaultTable(names);
  }
}
