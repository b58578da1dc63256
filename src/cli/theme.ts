import chalk from 'chalk';
import { isInteractive } from '../util/env.js';

export type Palette = {
  info: (s: string) => string;
  success: (s: string) => string;
  warn: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
  red: (s: string) => string;
  bold: (s: string) => string;
};

export function getPalette(
  noColor = !!process.env.NO_COLOR || process.argv.includes('--no-color') || !isInteractive(),
): Palette {
  const c = new chalk.Instance({ level: noColor ? 0 : 3 });
  const theme = (process.env.CLI_THEME || 'felt').toLowerCase();
  if (theme === 'mono') {
    return {
      info: c.white,
      success: c.white,
      warn: c.white,
      error: c.white,
      dim: c.gray,
      red: c.white,
      bold: c.bold,
    };
  }
  // felt (default): green table, red suits
  return {
    info: c.cyan,
    success: c.green,
    warn: c.yellow,
    error: c.red,
    dim: c.gray,
    red: c.red,
    bold: c.bold,
  };
}
