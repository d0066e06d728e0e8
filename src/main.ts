#!/usr/bin/env node
import { createPushScribe, type PushScribeRuntime } from './bootstrap/createPushScribe';
import { runStartupChecks } from './bootstrap/startupChecks';
import { resolveConfig, validateConfig } from './config';

let runtime: PushScribeRuntime | undefined;
let shuttingDown = false;

const shutdown = async (exitCode: number): Promise<void> => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  if (runtime) {
    runtime.hotkey.stop();
    await runtime.app.shutdown();
    await runtime.usage.flush();
    runtime.logger.info('PushScribe stopped');
    await runtime.logger.flush();
  }

  process.exit(exitCode);
};

const bootstrap = async (): Promise<void> => {
  const config = resolveConfig();
  const configErrors = validateConfig(config);

  if (configErrors.length > 0) {
    throw new Error(`Invalid PushScribe configuration:\n- ${configErrors.join('\n- ')}`);
  }

  runtime = await createPushScribe(config, { echoLogsToConsole: config.logLevel === 'debug' });
  const { app, logger } = runtime;

  const warnings = await runStartupChecks(config, logger);
  for (const warning of warnings) {
    process.stderr.write(`[warn] ${warning}\n`);
  }

  app.on('phaseChanged', (phase, previous) => {
    logger.debug('Phase changed', { phase, previous });
  });

  await app.start();
  process.stdout.write(`PushScribe ready. Hold ${app.getActiveHotkey()} to dictate. Ctrl+C quits.\n`);
};

const reportAndExit = (error: unknown): void => {
  const detail = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${detail}\n`);
  process.exit(1);
};

process.on('SIGINT', () => {
  shutdown(0).catch(reportAndExit);
});

bootstrap().catch((error) => {
  const detail = error instanceof Error ? error.message : String(error);
  runtime?.logger.error('Fatal bootstrap failure', { detail });
  process.stderr.write(`PushScribe startup error\n${detail}\n`);
  shutdown(1).catch(reportAndExit);
});
