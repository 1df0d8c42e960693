export {
  validateResourceId,
  normalizeParams,
  type QueryScalar,
  type QueryValue,
  type QueryParams,
  type NormalizedParams,
} from './params.js';
