/**
 * ServiceRegistry - Typed Service Container
 *
 * Holds the collaborators the intel pipeline needs at runtime (logging,
 * configuration, entity storage, the intel service itself). The gateway
 * fills it during bootstrap; the CLI and routes read from it.
 *
 * Usage:
 *   import { getServiceRegistry, Services } from '@content-intel/core';
 *   const intel = getServiceRegistry().get(Services.Intel);
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
// ServiceRegistry
// ============================================================================

export class ServiceRegistry {
  private readonly instances = new Map<string, unknown>();

  /**
   * Register a service instance, replacing any earlier one for the token.
   */
  register<T>(token: ServiceToken<T>, instance: T): void {
    this.instances.set(token.name, instance);
  }

  get<T>(token: ServiceToken<T>): T {
    const found = this.tryGet(token);
    if (found === null) {
      throw new Error(`Service '${token.name}' not registered. Register it during bootstrap before use.`);
    }
    return found;
  }

  tryGet<T>(token: ServiceToken<T>): T | null {
    if (!this.instances.has(token.name)) return null;
    // Only register() writes here, keyed by the same token, so the value is a T.
    return this.instances.get(token.name) as T;
  }

  has<T>(token: ServiceToken<T>): boolean {
    return this.instances.has(token.name);
  }

  /** Registered token names, in registration order */
  list(): string[] {
    return [...this.instances.keys()];
  }

  clear(): void {
    this.instances.clear();
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
 * Drop the global ServiceRegistry so the next bootstrap starts clean.
 */
export function resetServiceRegistry(): void {
  _registry?.clear();
  _registry = null;
}
