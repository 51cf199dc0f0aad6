#!/usr/bin/env node

/**
 * MoodTray CLI - Entry Point
 *
 * Runs the monitor with the Node.js metric source and the terminal renderer.
 */

import * as path from 'path';
import dotenv from 'dotenv';
import chalk from 'chalk';
import ora from 'ora';
import { listSkins, loadMoodConfig } from '../config/loader';
import { loadAnimationSet } from '../animation/loader';
import { NodeMetricSource } from '../metrics/node-metric-source';
import { TerminalRenderer } from '../renderer/terminal-renderer';
import { Orchestrator } from '../orchestrator/orchestrator';
import { getPaths } from '../utils/config';
import { ConfigError } from '../utils/errors';

dotenv.config();

async function main(): Promise<void> {
  const paths = getPaths();
  const spinner = ora('Loading configuration...').start();

  const config = await loadMoodConfig(path.resolve(paths.config)).catch((error: unknown) => {
    spinner.fail(chalk.red('Configuration rejected'));
    throw error;
  });

  const skinId = config.settings.currentSkin;
  const skins = listSkins(config);
  if (skins.length > 0 && !skins.some((skin) => skin.id === skinId)) {
    spinner.warn(chalk.yellow(`Skin '${skinId}' is not configured (available: ${skins.map((skin) => skin.id).join(', ')})`));
    spinner.start();
  }
  spinner.text = `Loading skin '${skinId}'...`;
  const animations = await loadAnimationSet(path.resolve(paths.skins, skinId), config.skins[skinId]);
  spinner.succeed(chalk.green(`Skin '${config.skins[skinId]?.name ?? skinId}' ready`));

  const orchestrator = new Orchestrator({
    source: new NodeMetricSource(),
    renderer: new TerminalRenderer(),
    thresholds: config.thresholds,
    animations,
    settings: config.settings,
  });

  const controller = new AbortController();
  const shutdown = (signal: string) => {
    console.log(chalk.yellow(`\n\n👋 ${signal} received. Stopping MoodTray...`));
    controller.abort();
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  orchestrator.start(controller.signal);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(chalk.red(`\n❌ ${error.message}`));
    console.error(chalk.gray(JSON.stringify(error.details, null, 2)));
  } else {
    console.error(chalk.red('\n❌ MoodTray failed to start:'), error);
  }
  process.exit(1);
});
