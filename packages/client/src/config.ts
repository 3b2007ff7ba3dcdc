import { z } from "zod"
import { ConfigError } from "./errors.js"

const clientConfigSchema = z.object({
  socketPath: z
    .string({ required_error: "no socket path given (use --socket or DTND_SOCKET)" })
    .min(1, "socket path must not be empty"),
  timeoutMs: z.coerce.number().int().positive().optional(),
  verbose: z.boolean().default(false),
})

export type ClientConfig = z.infer<typeof clientConfigSchema>

export type ClientConfigOverrides = {
  socketPath?: string
  timeoutMs?: number
  verbose?: boolean
}

/**
 * Resolve client settings. Explicit overrides (usually CLI flags) win over
 * the `DTND_SOCKET` and `DTND_TIMEOUT_MS` environment variables.
 *
 * @throws {ConfigError} listing every invalid setting
 */
export function loadClientConfig(
  overrides: ClientConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): ClientConfig {
  const result = clientConfigSchema.safeParse({
    socketPath: overrides.socketPath ?? env.DTND_SOCKET,
    timeoutMs: overrides.timeoutMs ?? (env.DTND_TIMEOUT_MS || undefined),
    verbose: overrides.verbose,
  })
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      ),
    )
  }
  return result.data
}
