import { TestEnvironment } from 'jest-environment-node';
import type { EnvironmentContext, JestEnvironmentConfig } from '@jest/environment';

/**
 * Jest test environment. Errors raised by Node's built-in modules (fs, net)
 * come from the host realm, so `instanceof Error` inside the sandbox misses
 * them; let the sandbox Error recognise host-realm errors too.
 */
export default class NodeEnvironment extends TestEnvironment {
  constructor(config: JestEnvironmentConfig, context: EnvironmentContext) {
    super(config, context);
    const SandboxError = this.global.Error;
    const HostError = Error;
    Object.defineProperty(SandboxError, Symbol.hasInstance, {
      value: (value: unknown): boolean =>
        Function.prototype[Symbol.hasInstance].call(SandboxError, value) || value instanceof HostError,
    });
  }
}
