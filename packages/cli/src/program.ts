import { Command } from "commander";
import type { Logger } from "@webpilot/schemas";
import { createLogger, logError } from "@webpilot/schemas";
import { describeIntent, resolveAll } from "@webpilot/resolver";
import type { BrowserDriver } from "@webpilot/browser";
import { ApiServer, DEFAULT_VERSION } from "@webpilot/api";
import type { Env, WebpilotConfig } from "./config.js";
import { loadConfig, parseNonNegativeInt, parsePort } from "./config.js";
import { createRuntime } from "./runtime.js";
import { runCommands } from "./runner.js";
import type { CommandOutcome } from "./runner.js";
import { DEMOS, isDemoName, missingCredentials } from "./demos.js";

export interface ProgramDeps {
  env?: Env;
  /** Replaces the Playwright driver; used by tests. */
  driver?: BrowserDriver;
  print?: (line: string) => void;
  setExitCode?: (code: number) => void;
}

interface ServeOptions {
  port?: string;
  host?: string;
  headed?: boolean;
  token?: string;
  slowMo?: string;
}

interface RunOptions {
  keepGoing?: boolean;
  base64?: boolean;
  headed?: boolean;
}

function formatOutcome({ command, result }: CommandOutcome): string {
  return JSON.stringify({ command, ...result });
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const env = deps.env ?? process.env;
  const print = deps.print ?? ((line: string) => console.log(line));
  const setExitCode = deps.setExitCode ?? ((code: number) => { process.exitCode = code; });

  async function runScript(config: WebpilotConfig, commands: readonly string[], opts: RunOptions, log: Logger): Promise<void> {
    const runtime = await createRuntime(config, { driver: deps.driver, env });
    try {
      const outcomes = await runCommands(runtime.executor, commands, {
        keepGoing: opts.keepGoing,
        includeBase64: opts.base64,
        onResult: (outcome) => print(formatOutcome(outcome)),
      });
      const failed = outcomes.filter((o) => !o.result.success).length;
      if (failed > 0) setExitCode(1);
      log.info(`${outcomes.length - failed}/${commands.length} command(s) succeeded`);
    } finally {
      await runtime.executor.close();
    }
  }

  const program = new Command();
  program.name("webpilot").description("Drive a browser with plain-language commands").version(DEFAULT_VERSION);

  program.command("serve").description("Start the HTTP API")
    .option("-p, --port <port>", "Port number (default: WEBPILOT_PORT or 8000)")
    .option("--host <host>", "Interface to bind (default: WEBPILOT_HOST or 127.0.0.1)")
    .option("--headed", "Show the browser window")
    .option("--token <token>", "Require this bearer token (default: WEBPILOT_API_TOKEN)")
    .option("--slow-mo <ms>", "Delay between browser operations")
    .action(async (opts: ServeOptions) => {
      const base = loadConfig(env);
      const config: WebpilotConfig = {
        ...base,
        port: opts.port !== undefined ? parsePort(opts.port) : base.port,
        host: opts.host ?? base.host,
        headless: opts.headed ? false : base.headless,
        slowMo: opts.slowMo !== undefined ? parseNonNegativeInt(opts.slowMo, "slow-mo") : base.slowMo,
        apiToken: opts.token ?? base.apiToken,
      };
      const log = createLogger("webpilot", { level: config.logLevel });
      const runtime = await createRuntime(config, { driver: deps.driver, env });
      const api = new ApiServer({
        executor: runtime.executor,
        metrics: runtime.metrics,
        apiToken: config.apiToken,
        version: DEFAULT_VERSION,
        logger: createLogger("api", { level: config.logLevel }),
      });
      await api.listen(config.port, config.host);

      const shutdown = () => {
        log.info("Shutting down");
        api.shutdown().then(
          () => process.exit(0),
          (err: unknown) => {
            logError(log, "Shutdown failed", err);
            process.exit(1);
          },
        );
      };
      process.once("SIGTERM", shutdown);
      process.once("SIGINT", shutdown);
    });

  program.command("run").description("Execute commands in order in one browser session")
    .argument("<commands...>", "Commands, each quoted")
    .option("--keep-going", "Continue after a failed command")
    .option("--base64", "Include screenshot bytes as base64 in results")
    .option("--headed", "Show the browser window")
    .action(async (commands: string[], opts: RunOptions) => {
      const base = loadConfig(env);
      const config = { ...base, headless: opts.headed ? false : base.headless };
      await runScript(config, commands, opts, createLogger("webpilot", { level: config.logLevel }));
    });

  program.command("parse").description("Show how a command resolves without running it")
    .argument("<command>", "Command text")
    .action((command: string) => {
      const [primary, ...rest] = resolveAll(command);
      if (!primary) {
        print(JSON.stringify({ error: `Could not understand command: ${command}` }));
        setExitCode(1);
        return;
      }
      print(JSON.stringify({
        intent: primary.intent,
        pattern: primary.pattern,
        description: describeIntent(primary.intent),
        alternatives: rest.map((m) => ({ pattern: m.pattern, intent: m.intent })),
      }, null, 2));
    });

  program.command("demo").description(`Run a scripted flow: ${Object.keys(DEMOS).join(", ")}`)
    .argument("<name>", "Demo name")
    .option("--headless", "Hide the browser window")
    .option("--keep-going", "Continue after a failed step")
    .action(async (name: string, opts: { headless?: boolean; keepGoing?: boolean }) => {
      if (!isDemoName(name)) {
        throw new Error(`Unknown demo "${name}". Available: ${Object.keys(DEMOS).join(", ")}`);
      }
      const demo = DEMOS[name];
      const config = { ...loadConfig(env), headless: opts.headless ?? false };
      const log = createLogger("demo", { level: config.logLevel });
      const missing = missingCredentials(demo, env);
      if (missing.length > 0) {
        log.warn(`${missing.join(", ")} not set; the login step will stop at the sign-in page`);
      }
      log.info(demo.description);
      await runScript(config, demo.commands, { keepGoing: opts.keepGoing }, log);
    });

  return program;
}
