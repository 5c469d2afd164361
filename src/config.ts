import { parseArgs } from "node:util"

import { z } from "zod"

import { GameModeSchema, LogLevelSchema } from "./schemas.ts"

export class ConfigError extends Error {
  override name = "ConfigError"
}

const ConfigSchema = z.object({
  game: z.string().min(1).optional(),
  noise: z.coerce.number().min(0).max(1).default(0.2),
  mode: GameModeSchema.optional(),
  seed: z.coerce.number().int().optional(),
  logLevel: LogLevelSchema.default("warn"),
  logFile: z.string().min(1).optional(),
})

export type Config = z.infer<typeof ConfigSchema>

/**
 * Flags win over environment variables. Empty values count as unset, whether
 * they come from a flag or the environment.
 */
export function loadConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): Config {
  let parsed
  try {
    parsed = parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        noise: { type: "string" },
        mode: { type: "string" },
        seed: { type: "string" },
      },
    })
  } catch (error) {
    throw new ConfigError(
      error instanceof Error ? error.message : "Invalid arguments",
    )
  }

  const { values, positionals } = parsed
  if (positionals.length > 1) {
    throw new ConfigError(
      `Expected at most one game, got: ${positionals.join(" ")}`,
    )
  }

  const setting = (flag: string | undefined, name: string) =>
    flag || env[name] || undefined

  const res = ConfigSchema.safeParse({
    game: positionals[0],
    noise: setting(values.noise, "ARCADE_NOISE"),
    mode: setting(values.mode, "ARCADE_MODE"),
    seed: setting(values.seed, "ARCADE_SEED"),
    logLevel: setting(undefined, "LOG_LEVEL"),
    logFile: setting(undefined, "LOG_FILE"),
  })

  if (!res.success) {
    throw new ConfigError(
      res.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; "),
    )
  }

  return res.data
}
