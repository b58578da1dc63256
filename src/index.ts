#!/usr/bin/env node
import dotenv from 'dotenv';
import readline from 'node:readline/promises';
import chalk from 'chalk';
import { loadTableConfig } from './config/index.js';
import { Shoe } from './games/blackjack/shoe.js';
import { runSession } from './games/blackjack/session.js';
import { createTerminalInput } from './cli/prompt.js';
import { TerminalRenderer } from './cli/render.js';
import log from './cli/logger.js';
import { cryptoRNG, seededRNG } from './util/rng.js';

dotenv.config({ override: false });

const logger = log.withScope('main');

async function main() {
  const cfg = loadTableConfig();
  logger.info('boot', { node: process.versions.node, decks: cfg.decks, seeded: cfg.seed !== undefined });

  const rng = cfg.seed !== undefined ? seededRNG(cfg.seed) : cryptoRNG;
  const shoe = Shoe.create(cfg.decks, { rng, reshuffleThreshold: cfg.reshuffleThreshold });
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.on('SIGINT', () => {
    rl.close();
    console.log('\nGame interrupted.');
    log.flush();
    process.exit(130);
  });

  const renderer = new TerminalRenderer();
  console.log(chalk.bold(`Welcome to Blackjack! You start with ${cfg.startingBalance} rocks.`));
  try {
    const summary = await runSession({
      shoe,
      balance: cfg.startingBalance,
      input: createTerminalInput(rl),
      output: renderer,
      topUp: cfg.topUp,
      rules: { dealerStandsOn: cfg.dealerStandsOn },
    });
    logger.info('session ended', { balance: summary.balance, rounds: summary.rounds, quit: summary.quit });
  } finally {
    rl.close();
  }
}

main()
  .then(() => log.flush())
  .catch((e: unknown) => {
    logger.error('fatal', e);
    console.error(chalk.red(`Error: ${e instanceof Error ? e.message : String(e)}`));
    log.flush();
    process.exitCode = 1;
  });
