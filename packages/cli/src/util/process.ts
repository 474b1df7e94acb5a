const exitSignals: NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

/**
 * Run `cleanUpFunction` on the first SIGTERM or SIGINT, and exit the process
 * on the second one so that it never hangs forever.
 */
export function onGracefulShutdown(
  cleanUpFunction: () => void | Promise<void>,
  // eslint-disable-next-line no-console
  logFn: (msg: string) => void = console.log
): void {
  for (const signal of exitSignals) {
    process.once(signal, async function onSignal() {
      logFn("Stopping gracefully, use Ctrl+C again to force process exit");

      process.on(signal, function onSecondSignal() {
        logFn("Forcing process exit");
        process.exit(1);
      });

      await cleanUpFunction();
    });
  }
}
