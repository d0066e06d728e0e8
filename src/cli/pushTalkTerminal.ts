#!/usr/bin/env node
import readline from 'node:readline';
import { createPushScribe } from '../bootstrap/createPushScribe';
import { runStartupChecks } from '../bootstrap/startupChecks';
import { resolveConfig, validateConfig } from '../config';
import { phaseGlyph, phaseLabel } from '../core/SessionPhase';
import type { SessionFeedback } from '../types';

const printHelp = (): void => {
  process.stdout.write('\n');
  process.stdout.write('Commands:\n');
  process.stdout.write('  <enter>               Start/stop dictation\n');
  process.stdout.write('  /status               Print current state\n');
  process.stdout.write('  /usage                Print today\'s usage and estimated cost\n');
  process.stdout.write('  /hotkey <accelerator> Change the global shortcut (e.g. Option+Space)\n');
  process.stdout.write('  /help                 Show this help\n');
  process.stdout.write('  /quit                 Exit\n');
  process.stdout.write('\n');
};

const describeFeedback = (feedback: SessionFeedback): string => {
  switch (feedback.kind) {
    case 'none':
      return '';
    case 'success':
      return ` last="${feedback.text}"`;
    case 'warning':
    case 'error':
      return ` ${feedback.kind}="${feedback.hint}"`;
  }
};

const main = async (): Promise<void> => {
  const config = resolveConfig();
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n- ${errors.join('\n- ')}`);
  }

  const { app, hotkey, usage, logger } = await createPushScribe(config);

  const warnings = await runStartupChecks(config, logger);
  for (const warning of warnings) {
    process.stdout.write(`[warn] ${warning}\n`);
  }

  try {
    await app.start();
    process.stdout.write(`Global hotkey: ${app.getActiveHotkey()} (hold to talk)\n`);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    process.stdout.write(`[warn] Global hotkey unavailable (${detail}); use <enter> instead.\n`);
  }

  process.stdout.write('Ready.\n');
  process.stdout.write(`Model: ${config.model}\n`);
  process.stdout.write(`Logs: ${logger.getLogPath()}\n`);
  printHelp();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: true
  });

  let shuttingDown = false;
  let commandChain = Promise.resolve();

  const queue = (fn: () => Promise<void>): void => {
    commandChain = commandChain
      .then(fn)
      .catch((error) => {
        const detail = error instanceof Error ? error.message : String(error);
        process.stderr.write(`\n[error] ${detail}\n`);
      });
  };

  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    hotkey.stop();
    await app.shutdown();
    await usage.flush();
    await logger.flush();
    rl.close();
    process.stdout.write('\nBye.\n');
    process.exit(0);
  };

  process.on('SIGINT', () => {
    queue(shutdown);
  });

  rl.on('line', (line) => {
    const input = line.trim();

    if (input === '/quit') {
      queue(shutdown);
      return;
    }

    if (input === '/status') {
      const phase = app.getPhase();
      process.stdout.write(
        `[status] ${phaseGlyph(phase)} ${phaseLabel(phase)} hotkey=${app.getActiveHotkey()}${describeFeedback(
          app.getFeedback()
        )}\n`
      );
      return;
    }

    if (input === '/usage') {
      const seconds = usage.secondsOn();
      process.stdout.write(
        `[usage] today=${seconds.toFixed(1)}s cost≈$${usage.estimatedCost(config.model).toFixed(4)} (${config.model})\n`
      );
      return;
    }

    if (input.startsWith('/hotkey')) {
      const accelerator = input.slice('/hotkey'.length).trim();
      if (!accelerator) {
        process.stdout.write('Usage: /hotkey <accelerator>, e.g. /hotkey Control+Shift+D\n');
        return;
      }

      queue(async () => {
        const message = await app.updateHotkeyShortcut(accelerator);
        process.stdout.write(`[hotkey] ${message}\n`);
      });
      return;
    }

    if (input === '/help') {
      printHelp();
      return;
    }

    if (input.length > 0) {
      process.stdout.write('Unknown command. Use /help, /status, /usage, /hotkey, or /quit.\n');
      return;
    }

    queue(() => app.toggleRecording());
  });
};

main().catch((error) => {
  const detail = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${detail}\n`);
  process.exit(1);
});
