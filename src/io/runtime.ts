/**
 * Effect platform layer selection
 *
 * File I/O is written against `@effect/platform` services; this module
 * supplies the Node.js implementations of those services.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer providing FileSystem, Path, and the other
 * platform services
 *
 * @example
 * ```typescript
 * await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
 * ```
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
