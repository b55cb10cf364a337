import chalk from 'chalk';

const SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Aborts `controller` on the first SIGINT or SIGTERM. The handlers stay
 * installed until the returned function is called, so repeated signals
 * cannot kill the process while it tears down.
 */
export function abortOnInterrupt(controller: AbortController, notice: string): () => void {
  const onSignal = (signal: NodeJS.Signals): void => {
    if (!controller.signal.aborted) {
      console.log(chalk.yellow(`\n${signal} received, ${notice}`));
      controller.abort(signal);
    }
  };

  for (const signal of SIGNALS) {
    process.on(signal, onSignal);
  }
  return () => {
    for (const signal of SIGNALS) {
      process.off(signal, onSignal);
    }
  };
}
