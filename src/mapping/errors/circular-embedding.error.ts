import { MappingConfigurationError } from './mapping-configuration.error';

export class CircularEmbeddingError extends MappingConfigurationError {
  readonly chain: string[];

  constructor(chain: string[]) {
    super(`Circular embedding detected: ${chain.join(' -> ')}`);
    this.name = 'CircularEmbeddingError';
    this.chain = chain;
    Object.setPrototypeOf(this, CircularEmbeddingError.prototype);
  }
}
