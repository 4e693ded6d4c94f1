/**
 * Configuration Module Exports
 *
 * @module config
 */

export {
  // Types
  type DigestConfig,
  type TraversalLimits,
  // Constants
  DEFAULT_DIGEST_CONFIG,
  DigestEnvSchema,
  ENV_KEYS,
  // Functions
  loadDigestConfig,
  getDigestConfig,
  resetDigestConfig,
} from "./digest-config.js";
