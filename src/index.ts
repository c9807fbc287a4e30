export * from './planform/types.js';
export * from './planform/grid.js';
export * from './planform/errors.js';
export * from './planform/defaults.js';
export * from './planform/grating.js';
export * from './planform/resolve.js';
export * from './planform/generate.js';
export * from './planform/summary.js';
export { encodePgm, quantizeToBytes } from './export/pgm.js';
export {
  hashCanonicalJson,
  hashCanonicalJsonString,
  readCanonicalJson,
  writeCanonicalJson,
  type CanonicalJsonWriteOptions,
  type CanonicalValue,
} from './serialization/canonicalJson.js';
