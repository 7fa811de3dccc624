import { createNullLogger, type Logger } from "@keyfill/logger"
import {
  ArgsSource,
  DupReporter,
  EnvSource,
  FilterSecretsReporter,
  JsonFileSource,
  type LoadedRecord,
  LoggerReporter,
  loadRecord,
  MapReporter,
  MapSource,
} from "@keyfill/lookup"
import { ServerConfig, type ServerConfigFields, serverDefaults } from "./schema"

export const SECRET_KEYS = /TOKEN|SECRET|PASSWORD/

export type AppConfigOptions = {
  /** Default: `process.argv.slice(2)` */
  argv?: readonly string[]
  /** Default: `process.env` */
  env?: Record<string, string | undefined>
  /** Directory holding the optional `config.json`. Default: `process.cwd()` */
  cwd?: string
  logger?: Logger
}

export type AppConfig = {
  config: LoadedRecord<ServerConfigFields>
  /** Resolved entries as text, with secrets masked. */
  entries: Record<string, string>
  /** Arguments that were not `--KEY=value` assignments. */
  extraArgs: string[]
}

/**
 * Resolves the server configuration from, in order of precedence: `--KEY=value`
 * arguments, the environment, `config.json` and built-in defaults.
 */
export async function loadAppConfig({
  argv = process.argv.slice(2),
  env = process.env,
  cwd = process.cwd(),
  logger = createNullLogger(),
}: AppConfigOptions = {}): Promise<AppConfig> {
  const args = new ArgsSource({ prefix: "--", args: argv })
  const entries = new MapReporter()

  const config = await loadRecord({
    schema: ServerConfig,
    sources: [
      args,
      new EnvSource({ env }),
      new JsonFileSource({ file: "config.json", required: false, cwd }),
      new MapSource(serverDefaults),
    ],
    reporter: new FilterSecretsReporter(
      new DupReporter(entries, new LoggerReporter(logger, { level: "debug" })),
      SECRET_KEYS,
    ),
    logger,
  })

  return { config, entries: entries.entries(), extraArgs: args.extraArgs() }
}
