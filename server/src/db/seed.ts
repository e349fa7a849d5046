import { DiseaseCatalog } from '../services/catalog';
import seed from './seed.json';

export function loadSeedCatalog(): DiseaseCatalog {
  const catalog = new DiseaseCatalog(seed);
  console.info(`[seed] loaded ${catalog.size} diseases`);
  return catalog;
}
