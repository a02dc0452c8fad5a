export type LogStream = 'stdout' | 'stderr';

/**
 * A log line the container prints once it can serve requests. The stream is
 * informational: testcontainers watches both.
 */
export interface ReadyCondition {
  kind: 'log';
  stream: LogStream;
  message: string;
}

export type EnvVars = Readonly<Record<string, string>>;

export interface ContainerImage {
  readonly name: string;
  readonly tag: string;
  /** `name:tag`, as passed to the Docker daemon. */
  readonly imageName: string;
  readyConditions(): ReadyCondition[];
  exposedPorts(): number[];
  envVars(): Record<string, string>;
  command(): string[];
}
