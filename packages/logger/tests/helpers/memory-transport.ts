import Transport from 'winston-transport';

/**
 * Collects every log entry it receives so tests can assert on fields.
 */
export class MemoryTransport extends Transport {
  readonly entries: Record<string, unknown>[] = [];

  override log(info: Record<string, unknown>, callback: () => void): void {
    this.entries.push({ ...info });
    callback();
  }
}
