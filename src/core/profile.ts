/**
 * Phase timings for `--profile`
 *
 * Steps are keyed by name and accumulate across calls, so per-file phases
 * report their summed time and how often they ran. Under concurrency the sum
 * can exceed the wall-clock total.
 */

export interface ProfileStep {
  name: string;
  ms: number;
  calls: number;
}

export interface ProfileReport {
  totalMs: number;
  steps: ProfileStep[];
}

export class Profiler {
  private readonly enabled: boolean;
  private readonly startNs: bigint;
  private readonly steps = new Map<string, ProfileStep>();

  constructor(enabled: boolean = false) {
    this.enabled = enabled;
    this.startNs = process.hrtime.bigint();
  }

  async section<T>(name: string, fn: () => Promise<T>): Promise<T> {
    if (!this.enabled) return fn();
    const sectionStart = process.hrtime.bigint();
    try {
      return await fn();
    } finally {
      this.record(name, sectionStart);
    }
  }

  /** Synchronous counterpart of `section`. */
  measure<T>(name: string, fn: () => T): T {
    if (!this.enabled) return fn();
    const sectionStart = process.hrtime.bigint();
    try {
      return fn();
    } finally {
      this.record(name, sectionStart);
    }
  }

  report(): ProfileReport | null {
    if (!this.enabled) return null;
    const totalMs = Number(process.hrtime.bigint() - this.startNs) / 1_000_000;
    return {
      totalMs,
      steps: [...this.steps.values()].map((step) => ({ ...step })),
    };
  }

  private record(name: string, sectionStart: bigint): void {
    const ms = Number(process.hrtime.bigint() - sectionStart) / 1_000_000;
    const step = this.steps.get(name);
    if (step) {
      step.ms += ms;
      step.calls += 1;
    } else {
      this.steps.set(name, { name, ms, calls: 1 });
    }
  }
}

export function createProfiler(enabled: boolean = false): Profiler {
  return new Profiler(enabled);
}
