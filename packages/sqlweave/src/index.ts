/**
 * sqlweave - All-in-one package
 *
 * ```bash
 * npm install sqlweave
 * ```
 *
 * Or install the core package directly:
 *
 * ```bash
 * npm install @sqlweave/core
 * ```
 */

// Re-export everything from core
export * from '@sqlweave/core';

// Convenience default export
import { createQueryBuilder } from '@sqlweave/core';
export default createQueryBuilder;
