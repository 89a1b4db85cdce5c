/**
 * ServiceRegistry - Typed Service Container
 *
 * Holds the process-wide services (logging today) behind typed tokens,
 * so modules resolve them without importing the server bootstrap.
 *
 * Usage:
 *   import { getServiceRegistry, Services } from '@pgdesk/core';
 *   const log = getServiceRegistry().get(Services.Log);
 */

// ============================================================================
// ServiceToken
// ============================================================================

/**
 * Typed key for service registration and retrieval.
 */
export class ServiceToken<T> {
  /** @internal Brand field to preserve generic type information */
  declare readonly _type: T;

  constructor(public readonly name: string) {}

  toString(): string {
    return `ServiceToken(${this.name})`;
  }
}

// ============================================================================
// Disposable interface
// ============================================================================

export interface Disposable {
  dispose(): Promise<void> | void;
}

function isDisposable(value: unknown): value is Disposable {
  return (
    value !== null &&
    typeof value === 'object' &&
    'dispose' in value &&
    typeof value.dispose === 'function'
  );
}

// ============================================================================
// ServiceRegistry
// ============================================================================

export class ServiceRegistry {
  private readonly instances = new Map<string, unknown>();
  private readonly disposables: Disposable[] = [];

  /**
   * Register a service instance. Disposable instances are cleaned up on dispose().
   */
  register<T>(token: ServiceToken<T>, instance: T): void {
    this.instances.set(token.name, instance);
    if (isDisposable(instance)) {
      this.disposables.push(instance);
    }
  }

  /**
   * Get a registered service. Throws if not found.
   */
  get<T>(token: ServiceToken<T>): T {
    if (!this.instances.has(token.name)) {
      throw new Error(
        `Service '${token.name}' not registered. ` +
        `Make sure it is registered during startup before use.`
      );
    }
    // Instances are only stored through register(), which binds T to the token
    return this.instances.get(token.name) as T;
  }

  tryGet<T>(token: ServiceToken<T>): T | null {
    return this.has(token) ? this.get(token) : null;
  }

  has<T>(token: ServiceToken<T>): boolean {
    return this.instances.has(token.name);
  }

  list(): string[] {
    return [...this.instances.keys()];
  }

  /**
   * Dispose all disposable services in reverse registration order.
   * Returns the errors raised by individual disposers.
   */
  async dispose(): Promise<unknown[]> {
    const failures: unknown[] = [];
    for (const d of [...this.disposables].reverse()) {
      try {
        await d.dispose();
      } catch (error) {
        failures.push(error);
      }
    }
    this.instances.clear();
    this.disposables.length = 0;
    return failures;
  }
}

// ============================================================================
// Singleton Access
// ============================================================================

let _registry: ServiceRegistry | null = null;

/**
 * Initialize the global ServiceRegistry. Call once during startup.
 */
export function initServiceRegistry(): ServiceRegistry {
  if (_registry) {
    throw new Error(
      'ServiceRegistry already initialized. Call resetServiceRegistry() first if re-initializing.'
    );
  }
  _registry = new ServiceRegistry();
  return _registry;
}

export function getServiceRegistry(): ServiceRegistry {
  if (!_registry) {
    throw new Error(
      'ServiceRegistry not initialized. Call initServiceRegistry() during startup.'
    );
  }
  return _registry;
}

export function hasServiceRegistry(): boolean {
  return _registry !== null;
}

/**
 * Dispose and drop the global ServiceRegistry (shutdown and tests).
 */
export async function resetServiceRegistry(): Promise<unknown[]> {
  const failures = _registry ? await _registry.dispose() : [];
  _registry = null;
  return failures;
}
