export {
  StateStore,
  createEmptyState,
  type MarketplaceState,
  type SequenceName,
} from './store.js';
