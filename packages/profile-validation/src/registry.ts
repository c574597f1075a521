/**
 * Baseline Registry
 *
 * Named collection of test baselines. Populated once at startup (single
 * writer), then read-only: call seal() when initialization is done.
 * Lookups are case-insensitive.
 */

import type { TestBaseline } from './baseline';
import { ConfigurationError, DuplicateNameError, NotFoundError } from './errors';

export interface RegisterOptions {
  /** Additional names the baseline can be looked up by */
  aliases?: string[];
}

interface RegistryEntry {
  name: string;
  baseline: TestBaseline;
}

export class BaselineRegistry {
  private entries = new Map<string, RegistryEntry>();
  private sealed = false;

  /**
   * Register a baseline under its test name and any aliases.
   * Nothing is registered if one of the names is taken.
   */
  register(baseline: TestBaseline, options: RegisterOptions = {}): this {
    if (this.sealed) {
      throw new ConfigurationError(
        `Cannot register '${baseline.testName}': baseline registry is sealed`
      );
    }

    const names = [baseline.testName, ...(options.aliases ?? [])].map((name) => name.trim());
    const keys = new Set<string>();
    for (const name of names) {
      const key = name.toLowerCase();
      if (!key) {
        throw new ConfigurationError(`Baseline '${baseline.testName}' has an empty alias`);
      }
      if (this.entries.has(key) || keys.has(key)) {
        throw new DuplicateNameError(name);
      }
      keys.add(key);
    }

    for (const name of names) {
      this.entries.set(name.toLowerCase(), { name, baseline });
    }
    return this;
  }

  lookup(name: string): TestBaseline {
    const entry = this.entries.get(name.trim().toLowerCase());
    if (!entry) {
      throw new NotFoundError(name, this.listNames());
    }
    return entry.baseline;
  }

  has(name: string): boolean {
    return this.entries.has(name.trim().toLowerCase());
  }

  /**
   * All registered names (test names and aliases) in registration order
   */
  listNames(): string[] {
    return [...this.entries.values()].map((entry) => entry.name);
  }

  /**
   * Distinct baselines in registration order
   */
  listBaselines(): TestBaseline[] {
    return [...new Set([...this.entries.values()].map((entry) => entry.baseline))];
  }

  get size(): number {
    return this.listBaselines().length;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }
}
