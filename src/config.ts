import { z } from "zod";
import { ConfigError } from "./errors.js";

/**
 * How sender/receiver lists are compared.
 * - "ordered": the comma-joined lists must match exactly, so reordering
 *   alone is reported as a node change.
 * - "set": only membership matters.
 */
export const NodeOrderSchema = z.enum(["ordered", "set"]);
export type NodeOrder = z.infer<typeof NodeOrderSchema>;

export const ConfigSchema = z.object({
  nodeOrder: NodeOrderSchema.default("ordered"),
  // Excel caps worksheet names at 31 characters and reserves a few symbols
  sheetName: z
    .string()
    .trim()
    .min(1)
    .max(31)
    .regex(/^[^*?:\\/[\]]*$/, "Must not contain any of * ? : \\ / [ ]")
    .refine((name) => !name.startsWith("'") && !name.endsWith("'"), "Must not start or end with an apostrophe")
    .default("DBC Comparison"),
  columnWidth: z.coerce.number().int().min(1).max(255).default(22),
  logLevel: z.enum(["info", "silent"]).default("info"),
});

export type DiffConfig = z.infer<typeof ConfigSchema>;

export type ConfigOverrides = {
  [K in keyof DiffConfig]?: string | number;
};

const SETTINGS = ["nodeOrder", "sheetName", "columnWidth", "logLevel"] as const satisfies ReadonlyArray<keyof DiffConfig>;

const ENV_KEYS: Record<keyof DiffConfig, string> = {
  nodeOrder: "DBC_DIFF_NODE_ORDER",
  sheetName: "DBC_DIFF_SHEET_NAME",
  columnWidth: "DBC_DIFF_COLUMN_WIDTH",
  logLevel: "DBC_DIFF_LOG_LEVEL",
};

/**
 * Resolve run settings. Precedence: explicit override > environment > default.
 * Empty environment values count as unset.
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): DiffConfig {
  const raw: Record<string, string | number> = {};
  for (const key of SETTINGS) {
    const override = overrides[key];
    const fromEnv = env[ENV_KEYS[key]];
    if (override !== undefined) {
      raw[key] = override;
    } else if (fromEnv !== undefined && fromEnv !== "") {
      raw[key] = fromEnv;
    }
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${describeSetting(issue.path)}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration - ${issues}`);
  }
  return parsed.data;
}

function describeSetting(path: Array<string | number>): string {
  const key = SETTINGS.find((setting) => setting === path[0]);
  if (key) {
    return `${key} (${ENV_KEYS[key]})`;
  }
  return path.join(".");
}
