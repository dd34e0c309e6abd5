#!/usr/bin/env node
/**
 * Demo for the virtual console
 * Run with: npm run demo
 */

import { ConsoleSession } from './renderer/ConsoleSession';
import { createPreferenceStore } from './config';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new RangeError(`Port out of range: ${value}`);
  }
  return port;
}

async function main(): Promise<void> {
  const ui = new ConsoleSession({
    logName: 'consolekitdemo',
    logLevel: 'info',
    preferences: createPreferenceStore().store,
  });

  try {
    ui.clear();
    ui.setMainTitle('consolekit demo');
    ui.printCenter('Welcome');
    ui.notice('Session started');

    for (let step = 0; step <= 40; step++) {
      ui.loadBar('Download', step, 40);
      if (step % 10 === 0) ui.console(`Fetched chunk ${step / 10}`);
      await sleep(25);
    }

    const colour = await ui.askList('Pick a colour', ['red', 'green', 'blue']);
    ui.console(`You picked ${ui.bold(colour)}`);

    const port = ui.wrap(parsePort)(await ui.input('Port to listen on:'));
    if (port === undefined) {
      ui.warn('No port configured');
    } else {
      ui.notice(`Listening on ${port}`);
    }

    const token = await ui.input('Access token (hidden):', { mask: true });
    ui.console(`Token has ${token.length} characters`);

    if (await ui.askYn('Show a failure report?', { defaultAnswer: true })) {
      ui.wrap(() => {
        JSON.parse('{not json');
      })();
    }

    await ui.input();
  } finally {
    ui.shutdown();
  }
}

main().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
