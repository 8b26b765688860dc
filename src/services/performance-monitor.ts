//phase timings for one pipeline run, logged at debug level
import { createLogger } from '../utils/logger.js';

const log = createLogger('performance');

export interface PhaseTiming { phase: string; durationMs: number; }

export class PerformanceMonitor {
  private timings: PhaseTiming[] = [];
  private readonly startedAt: number;

  constructor(private label: string, private now: () => number = () => performance.now()) {
    this.startedAt = now();
  }

  async time<T>(phase: string, run: () => Promise<T>): Promise<T> {
    const start = this.now();
    try {
      return await run();
    } finally {
      this.timings.push({ phase, durationMs: this.now() - start });
    }
  }

  getTimings(): PhaseTiming[] {
    return [...this.timings];
  }

  get totalMs(): number {
    return this.now() - this.startedAt;
  }

  report(): void {
    const phases = this.timings.map(t => `${t.phase}=${t.durationMs.toFixed(1)}ms`).join(' ');
    log.debug(`${this.label}: total=${this.totalMs.toFixed(1)}ms ${phases}`);
  }
}
