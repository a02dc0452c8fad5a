import { describe, it, expect } from 'vitest';
import { SupabaseImage } from '../../src/image/supabase-image.js';
import type { EnvVars, ReadyCondition } from '../../src/types.js';

class SampleImage extends SupabaseImage<SampleImage> {
  readonly name = 'example/sample';

  constructor(env: EnvVars = {}, tag = '1.0.0') {
    super({ B_DEFAULT: 'b', A_DEFAULT: 'a', ...env }, tag);
  }

  protected derive(env: EnvVars, tag: string): SampleImage {
    return new SampleImage(env, tag);
  }

  readyConditions(): ReadyCondition[] {
    return [{ kind: 'log', stream: 'stdout', message: 'ready' }];
  }

  exposedPorts(): number[] {
    return [8080];
  }

  withFlag(enabled: boolean): SampleImage {
    return this.set('FLAG', enabled);
  }

  withCount(count: number): SampleImage {
    return this.set('COUNT', count);
  }
}

describe('SupabaseImage', () => {
  it('imageName joins name and tag', () => {
    expect(new SampleImage().imageName).toBe('example/sample:1.0.0');
  });

  it('envVars() returns keys in ascending order', () => {
    const image = new SampleImage().withEnv('Z_LAST', 'z').withEnv('M_MIDDLE', 'm');
    expect(Object.keys(image.envVars())).toEqual(['A_DEFAULT', 'B_DEFAULT', 'M_MIDDLE', 'Z_LAST']);
  });

  it('constructor overrides are laid over defaults', () => {
    const image = new SampleImage({ A_DEFAULT: 'override', EXTRA: 'x' });
    expect(image.envVars()).toEqual({ A_DEFAULT: 'override', B_DEFAULT: 'b', EXTRA: 'x' });
  });

  it('withEnv returns a new instance and leaves the receiver untouched', () => {
    const base = new SampleImage();
    const derived = base.withEnv('NEW_KEY', 'value');
    expect(derived).not.toBe(base);
    expect(derived).toBeInstanceOf(SampleImage);
    expect(derived.getEnv('NEW_KEY')).toBe('value');
    expect(base.getEnv('NEW_KEY')).toBeUndefined();
  });

  it('withEnv overwrites an existing key', () => {
    const image = new SampleImage().withEnv('A_DEFAULT', 'first').withEnv('A_DEFAULT', 'second');
    expect(image.getEnv('A_DEFAULT')).toBe('second');
  });

  it('withTag changes the tag and keeps env vars', () => {
    const image = new SampleImage().withEnv('KEY', 'v').withTag('2.0.0');
    expect(image.tag).toBe('2.0.0');
    expect(image.getEnv('KEY')).toBe('v');
  });

  it('setters keep the tag', () => {
    const image = new SampleImage().withTag('3.1.4').withFlag(true);
    expect(image.tag).toBe('3.1.4');
  });

  it('stores booleans as "true"/"false"', () => {
    expect(new SampleImage().withFlag(true).getEnv('FLAG')).toBe('true');
    expect(new SampleImage().withFlag(false).getEnv('FLAG')).toBe('false');
  });

  it('stores numbers as decimal strings', () => {
    expect(new SampleImage().withCount(52428800).getEnv('COUNT')).toBe('52428800');
  });

  it('command() is empty by default', () => {
    expect(new SampleImage().command()).toEqual([]);
  });

  it('envVars() returns a fresh object each call', () => {
    const image = new SampleImage();
    const env = image.envVars();
    env['A_DEFAULT'] = 'mutated';
    expect(image.getEnv('A_DEFAULT')).toBe('a');
  });
});
