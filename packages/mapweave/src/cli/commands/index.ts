/**
 * Commands Index
 *
 * Registers every mapweave subcommand:
 * - generate: both pipelines, isolated
 * - points: point-cluster map only
 * - choropleth: choropleth map only
 * - inspect: role and join diagnostics
 */

import type { Command } from 'commander';
import { registerChoroplethCommand } from './choropleth.js';
import { registerGenerateCommand } from './generate.js';
import { registerInspectCommand } from './inspect.js';
import { registerPointsCommand } from './points.js';

export function registerCommands(program: Command): void {
  registerGenerateCommand(program);
  registerPointsCommand(program);
  registerChoroplethCommand(program);
  registerInspectCommand(program);
}
