import { PlatformName, PlatformSettings } from '../types/index.js';
import { Chrono24Strategy } from './chrono24.js';
import { VestiaireStrategy } from './vestiaire.js';
import { CatawikiStrategy } from './catawiki.js';
import { PlatformStrategy } from './platform-strategy.js';

export type { PlatformStrategy, PlatformSelectors, AdvertisedTotals, ExtractionResult } from './platform-strategy.js';

export const PLATFORM_NAMES: readonly PlatformName[] = ['chrono24', 'vestiaire', 'catawiki'];

export function createPlatformStrategy(name: PlatformName, settings: PlatformSettings): PlatformStrategy {
  switch (name) {
    case 'chrono24':
      return new Chrono24Strategy(settings);
    case 'vestiaire':
      return new VestiaireStrategy(settings);
    case 'catawiki':
      return new CatawikiStrategy(settings);
  }
}
