/**
 * Global type declarations for Flagmark runtime features.
 */
import type { DescriptorRegistry } from '../registry/descriptor-registry.js';

declare global {
  /**
   * Process-wide default registry, installed by DescriptorRegistry.shared().
   *
   * Stored on globalThis so that several copies of this module (duplicated
   * bundles, mixed ESM/CJS loading) still share a single cache.
   */
  var __FLAGMARK_REGISTRY__: DescriptorRegistry | undefined;
}

export {};
