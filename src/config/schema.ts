// ─── Bridge Config Schema ────────────────────────────────────────────────────
//
// Settings shared by the MCP server, the CLI and the device session. Every key
// has a default, so an empty object is a valid config.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { ValidationError } from "../errors.js";
import { MIN_STATUS_REPLY_BYTES } from "../midi/sysex.js";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

const BridgeConfigFields = z
  .object({
    max_chunk_bytes: z.number().int().min(1).max(1024).default(192),
    max_chunks_per_command: z.number().int().min(1).max(127).default(64),
    reassembly_timeout_seconds: z.number().positive().default(5),
    response_timeout_seconds: z.number().positive().default(7),
    midi_port_name: z.string().min(1).default("IAC Driver MCP Bridge"),
    feedback_port_name: z.string().min(1).default("IAC Driver Bus 1"),
    midi_channel: z.number().int().min(0).max(15).default(0),
    log_level: z.enum(LOG_LEVELS).default("info"),
  })
  .strict();

/** Every key a config file or FL_BRIDGE_* variable may set. */
export const CONFIG_KEYS: readonly string[] = Object.keys(BridgeConfigFields.shape);

export const BridgeConfigSchema = BridgeConfigFields.superRefine((config, ctx) => {
  // The device must be able to answer every command, even if only with a bare failure.
  const budget = config.max_chunk_bytes * config.max_chunks_per_command;
  if (budget < MIN_STATUS_REPLY_BYTES) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["max_chunks_per_command"],
      message:
        `max_chunk_bytes * max_chunks_per_command must be at least ${MIN_STATUS_REPLY_BYTES} ` +
        `bytes to carry a status reply (got ${budget})`,
    });
  }
});

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Validate a merged config object and apply defaults.
 * @throws ValidationError listing every offending field.
 */
export function parseBridgeConfig(raw: unknown): BridgeConfig {
  const result = BridgeConfigSchema.safeParse(raw);
  if (result.success) return result.data;

  const issues = result.error.issues.map((i) => `${i.path.join(".") || "root"}: ${i.message}`);
  throw new ValidationError(`Invalid bridge config:\n  ${issues.join("\n  ")}`, issues);
}

export function defaultConfig(): BridgeConfig {
  return parseBridgeConfig({});
}
