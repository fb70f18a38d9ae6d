// Stream endpoint options.

import { z } from "zod";

export const StreamOptionsSchema = z
  .object({
    /** IP address to bind and listen for connections on. */
    bindAddress: z.string().min(1).default("0.0.0.0"),
    /** Port to listen for connections on; 0 picks a free port. */
    port: z.number().int().min(0).max(65535).default(9999),
  })
  .strict();

export type StreamOptions = Readonly<z.output<typeof StreamOptionsSchema>>;
export type StreamOptionsInput = z.input<typeof StreamOptionsSchema>;
