/**
 * Component-scoped logger.
 * Delegates to a parent provider, merging its bound fields into each event.
 * Event fields win over bound fields on key collisions.
 */

import type { ILogProvider, LogEvent } from './ILogProvider.js';

export class ScopedLogProvider implements ILogProvider {
  constructor(
    private readonly parent: ILogProvider,
    private readonly bindings: Record<string, unknown>
  ) {}

  log(event: LogEvent): void {
    this.parent.log({
      ...event,
      fields: { ...this.bindings, ...event.fields },
    });
  }

  flush(): Promise<void> {
    return this.parent.flush();
  }

  child(fields: Record<string, unknown>): ILogProvider {
    return new ScopedLogProvider(this.parent, { ...this.bindings, ...fields });
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }
}
