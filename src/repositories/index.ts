import type { AppConfig } from '../config.js';
import type { ExtractionRepository } from './base.js';
import { InMemoryExtractionRepository } from './memory.js';
import { RedisExtractionRepository } from './redis.js';

export * from './base.js';
export * from './memory.js';
export * from './redis.js';

export function createExtractionRepository(config: AppConfig['repo']): ExtractionRepository {
  switch (config.kind) {
    case 'memory':
      return new InMemoryExtractionRepository();

    case 'redis':
      return new RedisExtractionRepository(config.url, config.token);
  }
}
