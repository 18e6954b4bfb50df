/**
 * Silent stand-in for the NestJS Logger, swapped in with vi.mock('@nestjs/common')
 */
export class MockLogger {
  constructor(_context?: string) {}

  log(..._args: unknown[]): void {}
  error(..._args: unknown[]): void {}
  warn(..._args: unknown[]): void {}
  debug(..._args: unknown[]): void {}
  verbose(..._args: unknown[]): void {}
}
