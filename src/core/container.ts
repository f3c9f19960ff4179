/**
 * Dependency Injection Container
 *
 * Keys and their service types are declared together in a service map, so
 * `get` returns the registered type without casts at the call site.
 *
 * @example
 * ```typescript
 * const container = new Container<{ greeting: string }>();
 * container.singleton("greeting", () => "hello");
 * container.get("greeting"); // string
 * ```
 */

export type Factory<M, K extends keyof M> = (container: Container<M>) => M[K];

interface Binding<M, K extends keyof M> {
  factory: Factory<M, K>;
  singleton: boolean;
  instance?: { value: M[K] };
}

type Bindings<M> = { [K in keyof M]?: Binding<M, K> };

export class Container<M> {
  private bindings: Bindings<M> = {};
  private resolving = new Set<keyof M>();

  /**
   * Register a transient service: the factory runs on every `get`
   */
  bind<K extends keyof M>(key: K, factory: Factory<M, K>): void {
    this.bindings[key] = { factory, singleton: false };
  }

  /**
   * Register a singleton: the factory runs once, on first `get`
   */
  singleton<K extends keyof M>(key: K, factory: Factory<M, K>): void {
    this.bindings[key] = { factory, singleton: true };
  }

  get<K extends keyof M>(key: K): M[K] {
    const binding = this.bindings[key];
    if (!binding) {
      throw new Error(`No binding found for '${String(key)}'`);
    }
    if (binding.instance) {
      return binding.instance.value;
    }
    if (this.resolving.has(key)) {
      const chain = [...this.resolving, key].map(String).join(" -> ");
      throw new Error(`Circular dependency detected: ${chain}`);
    }

    this.resolving.add(key);
    try {
      const value = binding.factory(this);
      if (binding.singleton) {
        binding.instance = { value };
      }
      return value;
    } finally {
      this.resolving.delete(key);
    }
  }

  has(key: keyof M): boolean {
    return this.bindings[key] !== undefined;
  }

  unbind(key: keyof M): void {
    delete this.bindings[key];
  }

  getRegisteredServices(): string[] {
    return Object.keys(this.bindings);
  }

  reset(): void {
    this.bindings = {};
    this.resolving.clear();
  }
}
