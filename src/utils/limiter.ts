export const LANES = ['llm', 'scraper'] as const;

export type Lane = (typeof LANES)[number];

export type LimiterConfig = Record<Lane, number>;

const defaultConfig: LimiterConfig = {
  llm: 3,
  scraper: 2,
};

/**
 * Caps in-flight calls per downstream dependency. One instance is shared by the
 * clients of a process so concurrent requests do not stampede the scraper or the LLM.
 */
export class LaneLimiter {
  private queues: Map<Lane, Array<() => void>> = new Map();
  private running: Map<Lane, number> = new Map();
  private config: LimiterConfig;

  constructor(config?: Partial<LimiterConfig>) {
    this.config = { ...defaultConfig, ...config };
    for (const lane of LANES) {
      this.queues.set(lane, []);
      this.running.set(lane, 0);
    }
  }

  async limit<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
    const running = this.running.get(lane) ?? 0;

    if (running < this.config[lane]) {
      this.running.set(lane, running + 1);
      return this.run(lane, fn);
    }

    return new Promise<T>((resolve, reject) => {
      this.queue(lane).push(() => {
        this.run(lane, fn).then(resolve, reject);
      });
    });
  }

  inFlight(lane: Lane): number {
    return this.running.get(lane) ?? 0;
  }

  private async run<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } finally {
      this.running.set(lane, (this.running.get(lane) ?? 1) - 1);
      this.processQueue(lane);
    }
  }

  private queue(lane: Lane): Array<() => void> {
    let queue = this.queues.get(lane);
    if (!queue) {
      queue = [];
      this.queues.set(lane, queue);
    }
    return queue;
  }

  private processQueue(lane: Lane): void {
    const queue = this.queue(lane);
    const running = this.running.get(lane) ?? 0;

    if (running < this.config[lane]) {
      const next = queue.shift();
      if (next) {
        this.running.set(lane, running + 1);
        next();
      }
    }
  }
}
