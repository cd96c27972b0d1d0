import type { ILoggerFactory, Logger } from '../../src/core/logging/index.js';
import type { LogEntry } from './FakeLogger.js';
import { FakeLogger } from './FakeLogger.js';

/**
 * Hands out one FakeLogger per component, created on first use, so a test
 * can read back what e.g. the 'bootstrap' component logged.
 */
export class FakeLoggerFactory implements ILoggerFactory {
  private readonly byComponent = new Map<string, FakeLogger>();
  private readonly rootLogger = new FakeLogger();

  get root(): Logger {
    return this.rootLogger.asLogger();
  }

  create(component: string): Logger {
    return this.loggerFor(component).asLogger();
  }

  /** Entries logged by one component, optionally at one level. */
  entries(component: string, level?: LogEntry['level']): LogEntry[] {
    return this.byComponent.get(component)?.getEntries(level) ?? [];
  }

  components(): string[] {
    return [...this.byComponent.keys()];
  }

  private loggerFor(component: string): FakeLogger {
    const existing = this.byComponent.get(component);
    if (existing) return existing;

    const created = new FakeLogger();
    this.byComponent.set(component, created);
    return created;
  }
}
