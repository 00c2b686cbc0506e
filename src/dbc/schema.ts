import { z } from "zod";
import { stripExtendedFlag } from "./types.js";

const NodeNameSchema = z.string().trim().min(1);

/**
 * Frame id as a non-negative integer or a `0x`-prefixed hex string. The
 * extended-frame flag is cleared, as for ids read from DBC text.
 */
export const FrameIdSchema = z
  .union([
    z.number().int().nonnegative(),
    z
      .string()
      .regex(/^0x[0-9a-f]+$/i, "Expected a 0x-prefixed hex string")
      .transform((value) => Number.parseInt(value.slice(2), 16)),
  ])
  .transform(stripExtendedFlag);

export const MessageSnapshotSchema = z.object({
  name: z.string().trim().min(1),
  frameId: FrameIdSchema,
  senders: z.array(NodeNameSchema).default([]),
  receivers: z.array(NodeNameSchema).default([]),
  signals: z.array(z.string().trim().min(1)).default([]),
});

/**
 * JSON form of a database, e.g. exported from another tool:
 * `{ "messages": [{ "name": "Engine", "frameId": "0x100", "senders": ["ECU1"], ... }] }`
 */
export const DatabaseSnapshotSchema = z.object({
  messages: z.array(MessageSnapshotSchema),
});

export type MessageSnapshot = z.infer<typeof MessageSnapshotSchema>;
export type DatabaseSnapshot = z.infer<typeof DatabaseSnapshotSchema>;
