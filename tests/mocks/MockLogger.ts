import ILogger from '../../lib/common/interfaces/ILogger';

/**
 * Logger that records everything logged, for asserting on in tests.
 */
export default class MockLogger implements ILogger {
  public infos: unknown[] = [];
  public warnings: unknown[] = [];
  public errors: unknown[] = [];

  info (data: unknown): void {
    this.infos.push(data);
  }

  warn (data: unknown): void {
    this.warnings.push(data);
  }

  error (data: unknown): void {
    this.errors.push(data);
  }
}
