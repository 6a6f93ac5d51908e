type Factory<T> = () => T;

class Container {
  private factories = new Map<string, Factory<unknown>>();
  private instances = new Map<string, unknown>();

  register<T>(key: string, factory: Factory<T>): void {
    this.factories.set(key, factory);
  }

  resolve<T>(key: string): T {
    // Return cached instance if exists
    if (this.instances.has(key)) {
      return this.instances.get(key) as T;
    }

    // Create new instance
    const factory = this.factories.get(key);
    if (!factory) {
      throw new Error(`No factory registered for key: ${key}`);
    }

    const instance = factory() as T;
    this.instances.set(key, instance);
    return instance;
  }

  // For testing: clear all instances
  clearInstances(): void {
    this.instances.clear();
  }

  // For testing: override with mock
  override<T>(key: string, instance: T): void {
    this.instances.set(key, instance);
  }
}

export const container = new Container();

export const KEYS = {
  // Configuration
  ENV: 'env',
  REPORT_CONFIG: 'reportConfig',

  // External Clients
  STATS_PROVIDER: 'statsProvider',

  // Services
  STATS_SERVICE: 'statsService',
  IDENTITY_SERVICE: 'identityService',
  REPORT_ASSEMBLER: 'reportAssembler',
  REPORT_WRITER: 'reportWriter',
};
