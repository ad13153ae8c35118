export { loadPreparedDataset, type LoadPreparedDatasetOptions } from './dataset-loader.ts';
export {
  createPreparedDatasetCache,
  type PreparedDatasetCache,
  type PreparedDatasetCacheOptions,
  type PreparedDatasetLoader,
} from './dataset-cache.ts';
