import { BackendAdapter } from '../interfaces/BackendAdapter';
import { ValidationError } from '../errors/LifecycleErrors';

/**
 * Maps backend names (ArtifactRef.backend) to adapters
 */
export class AdapterRegistry {
  private readonly adapters = new Map<string, BackendAdapter>();

  constructor(adapters: BackendAdapter[] = []) {
    adapters.forEach(adapter => this.register(adapter));
  }

  register(adapter: BackendAdapter): void {
    if (this.adapters.has(adapter.backend)) {
      throw new ValidationError(`Adapter already registered for backend ${adapter.backend}`, 'backend');
    }
    this.adapters.set(adapter.backend, adapter);
  }

  resolve(backend: string): BackendAdapter | undefined {
    return this.adapters.get(backend);
  }

  all(): BackendAdapter[] {
    return [...this.adapters.values()];
  }
}
