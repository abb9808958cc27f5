#!/usr/bin/env node
import { parseArgs, getBooleanFlag, getStringFlag, type ParsedArgs } from './cli/parser.js';
import { createOutput, Output } from './cli/output.js';
import { getCommand, commands } from './cli/commands/index.js';
import { loadConfig } from './config/loader.js';
import type { BreathscoreConfig, PartialConfig } from './config/schema.js';
import { createLogger, isLogLevel } from './observability/logger.js';
import { VERSION } from './version.js';

// Import commands to register them
import './cli/commands/score.js';
import './cli/commands/stale.js';
import './cli/commands/trend.js';
import './cli/commands/recommendation.js';

function cliConfigFlags(args: ParsedArgs): PartialConfig {
  const flags: PartialConfig = {};
  const logLevel = getStringFlag(args, 'log-level');
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new Error(`Invalid configuration: logLevel: unsupported value '${logLevel}'`);
    }
    flags.logLevel = logLevel;
  }
  if (getBooleanFlag(args, 'json')) {
    flags.json = true;
  }
  return flags;
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  let output = createOutput({ json: getBooleanFlag(args, 'json') });

  if (getBooleanFlag(args, 'version', 'v')) {
    output.log(`breathscore v${VERSION}`);
    return 0;
  }

  if (getBooleanFlag(args, 'help', 'h') || !args.command) {
    printHelp(output);
    return 0;
  }

  const cmd = getCommand(args.command);
  if (!cmd) {
    output.error(`Unknown command: ${args.command}`);
    output.log(`Run 'breathscore --help' for usage.`);
    return 1;
  }

  const cwd = process.cwd();
  let config: BreathscoreConfig;
  try {
    const configPath = getStringFlag(args, 'config');
    config = await loadConfig({
      cliFlags: cliConfigFlags(args),
      cwd,
      ...(configPath !== undefined ? { configPath } : {}),
    });
  } catch (error) {
    output.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  createLogger({ level: config.logLevel, json: config.json });
  output = createOutput({ json: config.json });

  return cmd.run({ args, output, config, cwd });
}

function printHelp(output: Output): void {
  output.log(`breathscore v${VERSION} - Personalized air-quality health scores`);
  output.log('');
  output.log('Usage: breathscore <command> [options]');
  output.log('');
  output.log('Commands:');
  for (const [name, cmd] of commands) {
    output.log(`  ${name.padEnd(12)} ${cmd.description}`);
    output.log(`  ${''.padEnd(12)} breathscore ${cmd.usage}`);
  }
  output.log('');
  output.log('Global Options:');
  output.log('  --help, -h       Show this help message');
  output.log('  --version, -v    Show version');
  output.log('  --json           Output as JSON');
  output.log('  --log-level      Set log level (debug, info, warn, error, silent)');
  output.log('  --config         Path to config file');
}

main()
  .then(code => process.exit(code))
  .catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
