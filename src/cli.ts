import { Command } from "commander";
import type { OptionValues } from "commander";
import { createResolver } from "./app.js";
import { FsAutosaveCache } from "./autosave/cache.js";
import { planRecovery, recover } from "./autosave/recovery.js";
import { loadConfig } from "./config.js";
import type { CliFlags, Env, OmnoteConfig } from "./config.js";
import { formatPlan, formatSession, formatSources, formatTheme } from "./format.js";
import { createLogger } from "./log.js";
import type { Logger } from "./log.js";
import { encodeSession, StateStore } from "./state/store.js";
import { renderCss } from "./theme/css.js";
import { configHomeFor, omarchyLayout, watchablePaths } from "./theme/registry.js";
import { ThemeSynchronizer } from "./theme/synchronizer.js";
import type { ThemeSpec } from "./theme/types.js";
import { SourceWatcher } from "./theme/watcher.js";

export const VERSION = "0.1.0";

interface Context {
  config: OmnoteConfig;
  env: Env;
  logger: Logger;
}

/** The root flags, wherever commander put them. */
export function flagsFrom(values: OptionValues): CliFlags {
  return { systemTheme: values.systemTheme === true, watch: values.watch !== false };
}

function loadContext(values: OptionValues): Context {
  const env = process.env;
  const config = loadConfig({ env, flags: flagsFrom(values) });
  return { config, env, logger: createLogger(config.paths.debugLog, config.debug) };
}

function openStore(ctx: Context): StateStore {
  return new StateStore({
    stateFile: ctx.config.paths.stateFile,
    legacyStateFile: ctx.config.paths.legacyStateFile,
    logger: ctx.logger.child({ module: "state" }),
  });
}

type ThemeFormat = "text" | "json" | "css";

function printTheme(spec: ThemeSpec, format: ThemeFormat): void {
  if (format === "json") {
    console.log(JSON.stringify(spec, null, 2));
  } else if (format === "css") {
    const css = renderCss(spec);
    if (css === null) console.error("System theme forced: no stylesheet is installed.");
    else console.log(css);
  } else {
    console.log(formatTheme(spec).join("\n"));
  }
}

function waitForInterrupt(): Promise<void> {
  return new Promise((resolve) => {
    process.once("SIGINT", () => resolve());
    process.once("SIGTERM", () => resolve());
  });
}

export function createProgram(launch?: (flags: CliFlags) => Promise<void>): Command {
  const program = new Command();
  program
    .name("omnote")
    .description("Theme sync and session continuity for the omnote editor")
    .version(VERSION)
    .option("--system-theme", "Ignore theme sources and use the system theme")
    .option("--no-watch", "Resolve the theme once; do not watch sources")
    .action(async (opts: OptionValues) => {
      if (!launch) {
        program.help();
        return;
      }
      await launch(flagsFrom(opts));
    });

  program
    .command("theme")
    .description("Print the resolved theme")
    .option("--json", "Output as JSON")
    .option("--css", "Output the stylesheet the editor installs")
    .option("-f, --follow", "Keep running and print each change")
    .action(async (opts: { json?: boolean; css?: boolean; follow?: boolean }, cmd: Command) => {
      const ctx = loadContext(cmd.optsWithGlobals());
      const format: ThemeFormat = opts.json ? "json" : opts.css ? "css" : "text";
      const resolver = createResolver(ctx.config, ctx.env, ctx.logger.child({ module: "theme" }));

      if (!opts.follow) {
        printTheme(await resolver.resolve(ctx.config.themeMode), format);
        return;
      }

      if (!ctx.config.watch) {
        console.error("Watching is disabled (--no-watch or OMNOTE_NO_WATCH).");
        process.exitCode = 1;
        return;
      }
      const watcher = new SourceWatcher({
        paths: watchablePaths(resolver.descriptors, omarchyLayout(configHomeFor(ctx.env, ctx.config.home))),
        debounceMs: ctx.config.timings.watchDebounceMs,
        logger: ctx.logger.child({ module: "watch" }),
      });
      const sync = new ThemeSynchronizer({
        resolver,
        watcher,
        mode: ctx.config.themeMode,
        logger: ctx.logger.child({ module: "theme" }),
        onWarning: (err) => console.error(`warning: ${err.message}`),
      });
      sync.subscribe((spec) => {
        printTheme(spec, format);
        if (format === "text") console.log("");
      });
      await sync.start();
      await waitForInterrupt();
      await sync.stop();
    });

  program
    .command("sources")
    .description("List theme sources in priority order")
    .action(async (_opts: unknown, cmd: Command) => {
      const ctx = loadContext(cmd.optsWithGlobals());
      const resolver = createResolver(ctx.config, ctx.env, ctx.logger.child({ module: "theme" }));
      const snapshots = await resolver.snapshots();
      console.log(formatSources(snapshots).join("\n"));
      const spec = await resolver.resolve(ctx.config.themeMode);
      console.log(`\nIn use: ${spec.sourceId} (${spec.mode})`);
    });

  program
    .command("session")
    .description("Show the stored session")
    .option("--json", "Output as JSON")
    .action(async (opts: { json?: boolean }, cmd: Command) => {
      const ctx = loadContext(cmd.optsWithGlobals());
      const session = await openStore(ctx).load();
      if (opts.json) {
        process.stdout.write(encodeSession(session));
      } else {
        console.log(formatSession(session).join("\n"));
      }
    });

  program
    .command("recover")
    .description("Reconcile the autosave cache with the stored session")
    .option("-y, --yes", "Restore every recoverable tab")
    .option("--discard", "Discard every recoverable tab")
    .action(async (opts: { yes?: boolean; discard?: boolean }, cmd: Command) => {
      if (opts.yes && opts.discard) {
        console.error("--yes and --discard are mutually exclusive");
        process.exitCode = 1;
        return;
      }
      const ctx = loadContext(cmd.optsWithGlobals());
      const store = openStore(ctx);
      const logger = ctx.logger.child({ module: "recovery" });
      const cache = new FsAutosaveCache(ctx.config.paths.autosaveDir, logger);
      const session = await store.load();
      const retentionMs = ctx.config.timings.autosaveRetentionMs;

      if (!opts.yes && !opts.discard) {
        const now = Date.now();
        const lines = formatPlan(planRecovery(session, await cache.list(), now, retentionMs), now);
        console.log(lines.length > 0 ? lines.join("\n") : "Nothing to recover.");
        return;
      }

      const accept = opts.yes === true;
      const outcome = await recover({ session, cache, confirm: async () => accept, logger, retentionMs });
      await store.save(outcome.session);
      console.log(
        `Recovered ${outcome.recovered.length}, discarded ${outcome.declined.length}, ` +
          `purged ${outcome.purged.length}, unreadable ${outcome.skipped.length}`,
      );
    });

  return program;
}
