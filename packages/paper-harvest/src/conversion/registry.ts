import { HarvestError } from '../core/errors.js';
import type { ConversionBackend } from './types.js';

export class BackendRegistry {
  private readonly backends = new Map<string, ConversionBackend>();

  register(backend: ConversionBackend): this {
    if (this.backends.has(backend.name)) {
      throw new HarvestError(`Conversion backend already registered: ${backend.name}`);
    }
    this.backends.set(backend.name, backend);
    return this;
  }

  has(name: string): boolean {
    return this.backends.has(name);
  }

  get(name: string): ConversionBackend | undefined {
    return this.backends.get(name);
  }

  names(): string[] {
    return [...this.backends.keys()];
  }
}
