import { MetricUnavailableError } from '../core/errors.js';
import { Logger } from '../core/logger.js';

export interface MetricScope {
  symbols?: string[];
  sectors?: string[];
  hypothesisId?: string;
}

export interface MetricQuery {
  scope?: MetricScope;
  window?: string;
}

/**
 * Returns the current value of one metric. `undefined` or `null` means no
 * data; a thrown error is logged and treated the same way.
 */
export type MetricProvider = (
  query: MetricQuery
) => number | null | undefined | Promise<number | null | undefined>;

export class MetricRegistry {
  private providers = new Map<string, MetricProvider>();

  constructor(private readonly logger: Logger = new Logger('info')) {}

  /** Serves a fixed value per metric name, whatever the query. */
  static fromValues(values: Record<string, number>, logger?: Logger): MetricRegistry {
    const registry = new MetricRegistry(logger);
    for (const [name, value] of Object.entries(values)) {
      registry.register(name, () => value);
    }
    return registry;
  }

  /** Replaces any provider already registered under `name`. */
  register(name: string, provider: MetricProvider): void {
    this.providers.set(name, provider);
    this.logger.debug(`Registered metric provider: ${name}`);
  }

  unregister(name: string): boolean {
    return this.providers.delete(name);
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  names(): string[] {
    return [...this.providers.keys()].sort();
  }

  async getValue(name: string, query: MetricQuery = {}): Promise<number | undefined> {
    const provider = this.providers.get(name);
    if (!provider) {
      this.logger.debug(`No provider registered for metric: ${name}`);
      return undefined;
    }
    let value: number | null | undefined;
    try {
      value = await provider(query);
    } catch (error) {
      this.logger.warn(`Metric provider for '${name}' failed`, error);
      return undefined;
    }
    if (value === null || value === undefined) {
      return undefined;
    }
    if (!Number.isFinite(value)) {
      this.logger.warn(`Metric provider for '${name}' returned a non-finite value: ${value}`);
      return undefined;
    }
    return value;
  }

  async require(name: string, query: MetricQuery = {}): Promise<number> {
    const value = await this.getValue(name, query);
    if (value === undefined) {
      throw new MetricUnavailableError(name, query.window);
    }
    return value;
  }
}
