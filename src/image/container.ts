import { GenericContainer, Wait } from 'testcontainers';
import type { WaitStrategy } from 'testcontainers';
import type { ContainerImage, ReadyCondition } from '../types.js';

export function waitStrategyFor(conditions: readonly ReadyCondition[]): WaitStrategy {
  const strategies = conditions.map(c => Wait.forLogMessage(c.message));
  const [first] = strategies;
  if (first === undefined) return Wait.forListeningPorts();
  if (strategies.length === 1) return first;
  return Wait.forAll(strategies);
}

/**
 * Translates an image description into a testcontainers request. The result
 * is not started, so callers can still attach networks, aliases or timeouts.
 */
export function buildContainer(image: ContainerImage): GenericContainer {
  const container = new GenericContainer(image.imageName)
    .withEnvironment(image.envVars())
    .withExposedPorts(...image.exposedPorts())
    .withWaitStrategy(waitStrategyFor(image.readyConditions()));

  const command = image.command();
  return command.length > 0 ? container.withCommand(command) : container;
}
