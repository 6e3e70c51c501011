import { z } from "zod";

import { loadDigraphConfig } from "../config/digraphConfig.js";
import { getDefaultLogger, StructuredLogger } from "../logger.js";
import { CapacityError } from "./errors.js";
import type { DigraphOptions } from "./types.js";

/** Schema validating the capacity hint accepted by the constructors. */
const CapacitySchema = z.number().int().nonnegative();

const OptionsSchema = z
  .object({
    initialCapacity: z.unknown().optional(),
    logger: z.instanceof(StructuredLogger).optional(),
  })
  .strict();

/** Constructor options once defaults have been applied. */
export interface ResolvedDigraphOptions {
  readonly initialCapacity: number;
  readonly logger: StructuredLogger;
}

/**
 * Validates the constructor options and fills in the configured defaults.
 * An invalid capacity raises {@link CapacityError}; other malformed options
 * surface the zod error unchanged.
 */
export function resolveDigraphOptions(options: DigraphOptions = {}): ResolvedDigraphOptions {
  const parsed = OptionsSchema.parse(options);
  let initialCapacity = loadDigraphConfig().initialCapacity;
  if (parsed.initialCapacity !== undefined) {
    const capacity = CapacitySchema.safeParse(parsed.initialCapacity);
    if (!capacity.success) {
      throw new CapacityError(parsed.initialCapacity);
    }
    initialCapacity = capacity.data;
  }
  return { initialCapacity, logger: parsed.logger ?? getDefaultLogger() };
}
