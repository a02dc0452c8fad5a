import type { GenericContainer, StartedTestContainer } from 'testcontainers';
import type { ContainerImage, EnvVars, ReadyCondition } from '../types.js';
import { buildContainer } from './container.js';

/**
 * Immutable builder over an env var map and an image tag. Every `with*` call
 * returns a new instance and leaves the receiver untouched.
 */
export abstract class SupabaseImage<Self extends SupabaseImage<Self>> implements ContainerImage {
  abstract readonly name: string;
  private readonly env: ReadonlyMap<string, string>;

  protected constructor(
    env: EnvVars,
    readonly tag: string,
  ) {
    this.env = new Map(Object.entries(env));
  }

  /** Returns a copy of the concrete builder carrying `env` and `tag`. */
  protected abstract derive(env: EnvVars, tag: string): Self;

  abstract readyConditions(): ReadyCondition[];

  abstract exposedPorts(): number[];

  get imageName(): string {
    return `${this.name}:${this.tag}`;
  }

  command(): string[] {
    return [];
  }

  getEnv(key: string): string | undefined {
    return this.env.get(key);
  }

  /** Env vars in ascending key order. */
  envVars(): Record<string, string> {
    const entries = [...this.env.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries);
  }

  withEnv(key: string, value: string): Self {
    return this.derive({ ...this.envVars(), [key]: value }, this.tag);
  }

  withTag(tag: string): Self {
    return this.derive(this.envVars(), tag);
  }

  toContainer(): GenericContainer {
    return this.configure(buildContainer(this));
  }

  start(): Promise<StartedTestContainer> {
    return this.toContainer().start();
  }

  protected set(key: string, value: string | number | boolean): Self {
    return this.withEnv(key, String(value));
  }

  /** Hook for image-specific container options beyond env, ports and command. */
  protected configure(container: GenericContainer): GenericContainer {
    return container;
  }
}
