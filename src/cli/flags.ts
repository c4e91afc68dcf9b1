/**
 * Global CLI flag definitions
 */

import { z } from "zod";

export interface ICliFlags {
  readonly dryRun: boolean;
  readonly silent: boolean;
  readonly verbose: boolean;
  readonly directory?: string | undefined;
  readonly config?: string | undefined;
}

const CliFlagsSchema = z.object({
  dryRun: z.boolean().default(false),
  silent: z.boolean().default(false),
  verbose: z.boolean().default(false),
  directory: z.string().optional(),
  config: z.string().optional(),
});

/** Narrow commander's option bag to the flags this CLI declares. */
export function parseCliFlags(options: Record<string, unknown>): ICliFlags {
  return CliFlagsSchema.parse(options);
}
