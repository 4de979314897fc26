#!/usr/bin/env node
import { render } from "ink";
import { startRuntime } from "./app.js";
import type { RecoveryCandidate } from "./autosave/recovery.js";
import { createProgram, VERSION } from "./cli.js";
import { loadConfig } from "./config.js";
import type { CliFlags } from "./config.js";
import type { OmnoteError } from "./errors.js";
import { createLogger } from "./log.js";
import { App } from "./ui/App.js";
import { RecoveryPrompt } from "./ui/RecoveryPrompt.js";

/** Ask about one recoverable tab with a throwaway ink render. */
function askRecovery(candidate: RecoveryCandidate): Promise<boolean> {
  return new Promise((resolve) => {
    const width = Math.min(80, (process.stdout.columns || 80) - 4);
    const instance = render(
      <RecoveryPrompt
        candidate={candidate}
        width={width}
        onAnswer={(accept) => {
          instance.unmount();
          resolve(accept);
        }}
      />,
    );
  });
}

async function launchTui(flags: CliFlags) {
  const env = process.env;
  const config = loadConfig({ env, flags });
  const logger = createLogger(config.paths.debugLog, config.debug);

  // Warnings raised before the App mounts are kept and shown once it does.
  const listeners = new Set<(message: string) => void>();
  let early: string | null = null;
  const onWarning = (err: OmnoteError) => {
    if (listeners.size === 0) early = err.message;
    for (const fn of listeners) fn(err.message);
  };
  const onWarnings = (fn: (message: string) => void) => {
    listeners.add(fn);
    if (early) fn(early);
    early = null;
    return () => {
      listeners.delete(fn);
    };
  };

  const runtime = await startRuntime({ config, env, logger, confirm: askRecovery, onWarning });

  const { waitUntilExit } = render(<App runtime={runtime} version={VERSION} onWarnings={onWarnings} />);
  try {
    await waitUntilExit();
  } finally {
    await runtime.shutdown();
  }
}

async function main() {
  const program = createProgram(launchTui);
  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
