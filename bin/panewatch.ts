#!/usr/bin/env node

/**
 * CLI entry point for panewatch
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import chalk from 'chalk';
import { resolveActiveAgent } from '../src/config/index.js';
import { errorMessage } from '../src/errors.js';
import { createCommandContext, type CommandContext } from '../src/cli/common/context.js';
import { ensureTmuxInstalled } from '../src/cli/common/tmux.js';
import {
  addAgentOptions,
  addLinesOption,
  parseDurationFlag,
  parseLinesFlag,
  parseScanIntervalFlag,
} from '../src/cli/common/options.js';
import { agentsCommand } from '../src/cli/commands/agents.js';
import { broadcastCommand } from '../src/cli/commands/broadcast.js';
import { captureCommand, DEFAULT_CAPTURE_LINES, DEFAULT_HISTORY_LINES } from '../src/cli/commands/capture.js';
import { configCommand } from '../src/cli/commands/config.js';
import { createCommand } from '../src/cli/commands/create.js';
import { diffCommand, DEFAULT_DIFF_LINES } from '../src/cli/commands/diff.js';
import { killAllCommand, killCommand } from '../src/cli/commands/kill.js';
import { logsCommand } from '../src/cli/commands/logs.js';
import { panesCommand } from '../src/cli/commands/panes.js';
import { renameCommand } from '../src/cli/commands/rename.js';
import { restartCommand } from '../src/cli/commands/restart.js';
import { sendCommand } from '../src/cli/commands/send.js';
import { statusCommand } from '../src/cli/commands/status.js';
import { watchCommand } from '../src/cli/commands/watch.js';
import { workspaceCommand } from '../src/cli/commands/workspace.js';

function resolveCliVersion(): string {
  const candidates = [
    new URL('../package.json', import.meta.url),
    new URL('../../package.json', import.meta.url),
  ];

  for (const candidate of candidates) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(fileURLToPath(candidate), 'utf-8'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
    } catch {
      // Try next candidate.
    }
  }

  return process.env.npm_package_version || '0.0.0';
}

let context: CommandContext | undefined;

function ctx(): CommandContext {
  context ??= createCommandContext();
  return context;
}

/** Context for commands that talk to tmux. */
function tmuxCtx(): CommandContext {
  const current = ctx();
  ensureTmuxInstalled(current.tmux);
  return current;
}

/** Print command errors the same way for every command and fail the process. */
async function run(action: () => void | Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    console.error(chalk.red(`error: ${errorMessage(error)}`));
    process.exitCode = 1;
  }
}

await addAgentOptions(yargs(hideBin(process.argv)))
  .scriptName('panewatch')
  .usage('$0 [--claude|--codex] <command>')
  .version(resolveCliVersion())
  .help()
  .strict()
  .demandCommand(1, 'Specify a command')
  .command(
    'panes',
    'List coding agent panes',
    (y) => y,
    () => run(() => panesCommand(tmuxCtx())),
  )
  .command(
    'capture <pane>',
    'Capture pane output',
    (y) => addLinesOption(y.positional('pane', { type: 'string', demandOption: true }), DEFAULT_CAPTURE_LINES),
    (argv) => run(() => captureCommand(argv.pane, parseLinesFlag(argv.lines, DEFAULT_CAPTURE_LINES), tmuxCtx())),
  )
  .command(
    'history <pane>',
    'Capture extended scrollback',
    (y) => addLinesOption(y.positional('pane', { type: 'string', demandOption: true }), DEFAULT_HISTORY_LINES),
    (argv) => run(() => captureCommand(argv.pane, parseLinesFlag(argv.lines, DEFAULT_HISTORY_LINES), tmuxCtx())),
  )
  .command(
    'send <pane> <text..>',
    'Send text to a pane',
    (y) => y
      .positional('pane', { type: 'string', demandOption: true })
      .positional('text', { type: 'string', array: true, demandOption: true }),
    (argv) => run(() => sendCommand(argv.pane, argv.text, tmuxCtx())),
  )
  .command(
    'create',
    'Create a new pane running an agent',
    (y) => y
      .option('command', { type: 'string', describe: 'Command to run (default: configured agent)' })
      .option('keys', { type: 'string', describe: 'Send text after startup' })
      .option('session', { type: 'string', describe: 'Target session (default: current)' })
      .option('split', { choices: ['h', 'v'] as const, default: 'h' as const, describe: 'Split direction' })
      .option('new-window', { type: 'boolean', describe: 'Create as new window instead of split' }),
    (argv) => run(() => createCommand(
      {
        command: argv.command,
        keys: argv.keys,
        session: argv.session,
        split: argv.split,
        newWindow: argv.newWindow,
      },
      resolveActiveAgent(ctx().config, argv),
      tmuxCtx(),
    )),
  )
  .command(
    'kill <pane>',
    'Kill a pane',
    (y) => y.positional('pane', { type: 'string', demandOption: true }),
    (argv) => run(() => killCommand(argv.pane, tmuxCtx())),
  )
  .command(
    'kill-all',
    'Kill all coding agent panes',
    (y) => y,
    () => run(() => killAllCommand(tmuxCtx())),
  )
  .command(
    'restart <pane>',
    'Restart the agent session in a pane',
    (y) => y.positional('pane', { type: 'string', demandOption: true }),
    (argv) => run(() => restartCommand(argv.pane, resolveActiveAgent(ctx().config, argv), tmuxCtx())),
  )
  .command(
    'rename <pane> <title..>',
    'Set pane title',
    (y) => y
      .positional('pane', { type: 'string', demandOption: true })
      .positional('title', { type: 'string', array: true, demandOption: true }),
    (argv) => run(() => renameCommand(argv.pane, argv.title, tmuxCtx())),
  )
  .command(
    'status',
    'Show active/idle status of agent panes',
    (y) => y
      .option('short', { type: 'boolean', describe: 'One-line summary' })
      .option('idle', { type: 'string', describe: 'Idle threshold (default: 10m)' }),
    (argv) => run(() => statusCommand(
      {
        short: argv.short,
        idleThresholdMs: parseDurationFlag(argv.idle, 'idle', ctx().config.idleThresholdMs),
      },
      tmuxCtx(),
    )),
  )
  .command(
    'logs <pane>',
    'Save pane output to a file',
    (y) => addLinesOption(y.positional('pane', { type: 'string', demandOption: true }), DEFAULT_HISTORY_LINES)
      .option('file', { type: 'string', describe: 'Output file (default: config log directory)' }),
    (argv) => run(() => logsCommand(
      argv.pane,
      { file: argv.file, lines: parseLinesFlag(argv.lines, DEFAULT_HISTORY_LINES) },
      tmuxCtx(),
    )),
  )
  .command(
    'broadcast <text..>',
    'Send text to all coding agent panes',
    (y) => y.positional('text', { type: 'string', array: true, demandOption: true }),
    (argv) => run(() => broadcastCommand(argv.text, tmuxCtx())),
  )
  .command(
    'diff <first> <second>',
    'Compare output of two panes',
    (y) => addLinesOption(
      y
        .positional('first', { type: 'string', demandOption: true })
        .positional('second', { type: 'string', demandOption: true }),
      DEFAULT_DIFF_LINES,
    ),
    (argv) => run(() => diffCommand(argv.first, argv.second, parseLinesFlag(argv.lines, DEFAULT_DIFF_LINES), tmuxCtx())),
  )
  .command(
    'workspace',
    'Create a git worktree and an agent pane in it',
    (y) => y
      .option('repo', { type: 'string', describe: 'Repository as owner/repo (ghq layout)' })
      .option('issue', { type: 'string', describe: 'Issue number to work on' })
      .option('branch', { type: 'string', describe: 'Branch name (default: issue-<N>)' }),
    (argv) => run(() => workspaceCommand(
      { repo: argv.repo, issue: argv.issue, branch: argv.branch },
      resolveActiveAgent(ctx().config, argv),
      tmuxCtx(),
    )),
  )
  .command(
    'watch',
    'Monitor panes and report idle ones',
    (y) => y
      .option('scan', { type: 'string', describe: 'Scan interval (default: 10s)' })
      .option('idle', { type: 'string', describe: 'Idle threshold (default: 10m)' })
      .option('log', { type: 'string', describe: 'Also write output to a log file' }),
    (argv) => run(() => watchCommand(
      {
        scanIntervalMs: parseScanIntervalFlag(argv.scan, ctx().config.scanIntervalMs),
        idleThresholdMs: parseDurationFlag(argv.idle, 'idle', ctx().config.idleThresholdMs),
        logFile: argv.log,
      },
      tmuxCtx(),
    )),
  )
  .command(
    'agents',
    'List recognised coding agents',
    (y) => y,
    () => run(() => agentsCommand(ctx())),
  )
  .command(
    'config',
    'Show or change persisted settings',
    (y) => y
      .option('default-agent', { type: 'string', describe: 'Agent started by create/restart/workspace' })
      .option('idle', { type: 'string', describe: 'Default idle threshold' })
      .option('scan', { type: 'string', describe: 'Default scan interval' })
      .option('show', { type: 'boolean', describe: 'Show current configuration' }),
    (argv) => run(() => configCommand(
      { show: argv.show, defaultAgent: argv.defaultAgent, idle: argv.idle, scan: argv.scan },
      ctx(),
    )),
  )
  .parseAsync();
