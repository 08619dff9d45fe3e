/**
 * Dependency Injection Container
 *
 * IoC container for dependency management.
 */

type Factory<T> = () => T;
type Token = string | symbol;

interface Registration {
  singleton: boolean;
  factory: Factory<unknown>;
}

export class Container {
  private registrations = new Map<Token, Registration>();
  private instances = new Map<Token, unknown>();

  /**
   * Register a new dependency.
   * @param token - The token to register the dependency under.
   * @param factory - The factory function to create the dependency.
   * @param options - singleton: true by default.
   */
  register<T>(token: Token, factory: Factory<T>, options: { singleton?: boolean } = {}): this {
    this.instances.delete(token);
    this.registrations.set(token, {
      singleton: options.singleton ?? true,
      factory,
    });
    return this;
  }

  registerInstance<T>(token: Token, instance: T): this {
    this.registrations.set(token, {
      singleton: true,
      factory: () => instance,
    });
    this.instances.set(token, instance);
    return this;
  }

  resolve<T>(token: Token): T {
    // Singleton checker
    if (this.instances.has(token)) {
      return this.instances.get(token) as T;
    }

    // Registration checker
    const registration = this.registrations.get(token);
    if (!registration) {
      throw new Error(`No registration found for token: ${String(token)}`);
    }

    // Instance creator
    const instance = registration.factory();

    // Singleton storage
    if (registration.singleton && instance !== undefined) {
      this.instances.set(token, instance);
    }

    return instance as T;
  }

  has(token: Token): boolean {
    return this.registrations.has(token);
  }

  clear(): void {
    this.registrations.clear();
    this.instances.clear();
  }
}

// Singleton container instance
let globalContainer: Container | null = null;

export function getGlobalContainer(): Container {
  if (!globalContainer) {
    globalContainer = new Container();
  }
  return globalContainer;
}
