import type { AppConfig } from '../config.js';
import type { CarrierDataSourceFactory } from './base.js';
import { DemoCarrierDataSource } from './demo.js';
import { HttpCarrierDataSource } from './http.js';

export * from './base.js';
export * from './demo.js';
export * from './http.js';

export function createCarrierDataSourceFactory(config: AppConfig['source']): CarrierDataSourceFactory {
  switch (config.kind) {
    case 'demo':
      return () => new DemoCarrierDataSource();

    case 'http':
      return () => new HttpCarrierDataSource({
        baseUrl: config.baseUrl,
        token: config.token,
        actorId: config.actorId,
      });
  }
}
