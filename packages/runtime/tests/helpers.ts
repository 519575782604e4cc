/**
 * Shared fixtures for runtime tests
 */
import type { MintParams } from '@provrec/record';

export function validParams(overrides: Partial<MintParams> = {}): MintParams {
  return {
    contentPackageName: 'Test Package',
    merkleIntegrityAlgo: 61,
    merkleRoot: new Uint8Array(32).fill(0xab),
    packageStorageBlobRef: new TextEncoder().encode('package_blob_id'),
    manifestVersion: '1.4',
    manifestIntegrityAlgo: 62,
    manifestHash: new Uint8Array(32).fill(0xcd),
    manifestStorageBlobRef: new TextEncoder().encode('manifest_blob_id'),
    ...overrides,
  };
}

/**
 * In-memory pino destination.
 */
export function captureLines(): { lines: string[]; write(msg: string): void; records(): Record<string, unknown>[] } {
  const lines: string[] = [];
  return {
    lines,
    write(msg: string): void {
      lines.push(msg);
    },
    records(): Record<string, unknown>[] {
      return lines.map((line): Record<string, unknown> => JSON.parse(line));
    },
  };
}

export function sequentialIds(): () => string {
  let n = 0;
  return () => `0x${(++n).toString(16).padStart(64, '0')}`;
}
