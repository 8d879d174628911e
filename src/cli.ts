#!/usr/bin/env node
/**
 * Provisioner CLI
 *
 * Commands:
 *   provision run      [--profile <id> | --profile-file <path>] [--only ...] [--out <dir>] [--json]
 *   provision plan     [--profile <id> | --profile-file <path>] [--out <dir>] [--json]
 *   provision profiles [--show <id>]
 *   provision token    [env] [--endpoint <url>]
 *
 * Exit codes:
 *   0  success (failures abandoned at the retry prompt included)
 *   1  one or more units failed
 *   2  validation error (bad profile, bad flag)
 *   3  external dependency failure (IO, upstream)
 *   4  unexpected bug
 */

import { Command } from 'commander';
import { confirm } from '@inquirer/prompts';
import { resolve } from 'path';
import { loadConfig } from './config/index.js';
import type { ConfigOverrides, Env } from './config/index.js';
import type { Profile } from './contracts/index.js';
import { hasValidToken } from './credentials/index.js';
import { createCommandRunner } from './process/index.js';
import { getProfile, listProfiles, loadProfileFile, serializeProfile } from './profiles/index.js';
import { planProvisioning, runProvisioning } from './provision/index.js';
import { formatOutcome } from './report/index.js';
import { createTransfer } from './transfer/index.js';

import {
  createArtifactWriter,
  createLogger,
  pruneRuns,
  ConfigError,
  DEFAULT_KEEP_RUNS,
  wrapError,
  exitCodeFor,
  EXIT_SUCCESS,
  EXIT_UNITS_FAILED,
  type StructuredLogger,
  type ArtifactWriter,
  type RetryPrompt,
  type RunnerErrorEnvelope,
} from './runner/index.js';

// ---------------------------------------------------------------------------
// Program setup
// ---------------------------------------------------------------------------

const DEFAULT_PROFILE = 'user';
const DEFAULT_TOKEN_ENDPOINT = 'https://huggingface.co/api/whoami-v2';

interface ProfileOptions {
  profile: string;
  profileFile?: string;
  workspace?: string;
  out: string;
  keepRuns: string;
  json?: boolean;
  verbose?: boolean;
}

interface RunCommandOptions extends ProfileOptions {
  only?: string[];
  skip?: string[];
  concurrency?: string;
  segments?: string;
  interactive: boolean;
  transfer?: string;
  autoUpdate?: boolean;
}

const collect = (value: string, previous: string[] = []): string[] => [
  ...previous,
  ...value.split(',').map((v) => v.trim()).filter((v) => v.length > 0),
];

const program = new Command();

program
  .name('provision')
  .description('Declarative, idempotent machine provisioning from JSON profiles')
  .version('0.1.0');

function addProfileOptions(cmd: Command): Command {
  return cmd
    .option('--profile <id>', 'Bundled profile to use', DEFAULT_PROFILE)
    .option('--profile-file <path>', 'Load the profile from a JSON file instead')
    .option('--workspace <dir>', 'Workspace root (overrides $WORKSPACE and the profile)')
    .option('--out <dir>', 'Directory that receives artifacts/<runId>', '.')
    .option('--keep-runs <n>', 'Run directories to keep under artifacts/', String(DEFAULT_KEEP_RUNS))
    .option('--json', 'Emit structured JSON (log lines to stderr, result to stdout)')
    .option('--verbose', 'Include debug log lines');
}

// ---------------------------------------------------------------------------
// run: provision the machine
// ---------------------------------------------------------------------------

addProfileOptions(program.command('run'))
  .description('Install every missing unit and download every missing file')
  .option('--only <names>', 'Run only these units (comma-separated, repeatable)', collect)
  .option('--skip <names>', 'Skip these units (comma-separated, repeatable)', collect)
  .option('--concurrency <n>', 'Concurrent downloads per unit (default $PROVISION_CONCURRENCY or 4)')
  .option('--segments <n>', 'Parallel range requests per file')
  .option('--transfer <backend>', 'Transfer backend: http or aria2c')
  .option('--auto-update', 'Update units that are already present (default $AUTO_UPDATE or on)')
  .option('--no-auto-update', 'Leave present units untouched')
  .option('--no-interactive', 'Never prompt; the attempt bound is final')
  .action(async (options: RunCommandOptions) => {
    const startedAt = new Date().toISOString();
    const aw = createArtifactWriter(resolve(options.out));
    const log = commandLogger(aw, options);

    try {
      pruneArtifacts(options, aw, log);
      const profile = selectProfile(options);
      const overrides: ConfigOverrides = {
        workspace: options.workspace,
        autoUpdate: options.autoUpdate,
        concurrency: options.concurrency,
        segments: options.segments,
        interactive: options.interactive,
        transfer: options.transfer,
        only: options.only,
        skip: options.skip,
      };
      const config = loadConfig(profile, overrides, { env: process.env, isTTY: Boolean(process.stdin.isTTY) });

      const env: Env = { ...process.env, WORKSPACE: config.workspace };
      const exec = createCommandRunner(env);
      const transfer = createTransfer(config.transfer, { fetch, exec, segments: config.segments, logger: log });

      const report = await runProvisioning({
        profile,
        config,
        env,
        exec,
        fetch,
        transfer,
        logger: log,
        prompt: config.interactive ? confirmPrompt : undefined,
      });

      const result = report.summary();
      aw.writeEvidence('report', result);
      const summary = aw.finalize({
        command: 'run',
        profile: profile.profile_id,
        workspace: config.workspace,
        startedAt,
        exitCode: result.exit_code,
        stats: {
          total: result.total,
          succeeded: result.succeeded,
          skipped: result.skipped,
          failed: result.failed,
          failed_units: result.failed_units,
        },
      });

      if (options.json) {
        process.stdout.write(JSON.stringify({ summary, report: result }, null, 2) + '\n');
      } else {
        console.log(`\nRun complete: ${result.succeeded} succeeded, ${result.skipped} skipped, ${result.failed} failed`);
        for (const outcome of result.outcomes) {
          console.log(`  ${formatOutcome(outcome)}`);
        }
        if (result.failed_units.length > 0) {
          console.log(`\nFailed units: ${result.failed_units.join(', ')}`);
        }
        console.log(`\nArtifacts: ${aw.dir}`);
      }

      process.exit(result.exit_code);
    } catch (err) {
      handleError(err, 'run', startedAt, aw, log, options.json);
    }
  });

// ---------------------------------------------------------------------------
// plan: presence checks only, nothing is installed or downloaded
// ---------------------------------------------------------------------------

addProfileOptions(program.command('plan'))
  .description('Show what a run would do without changing anything')
  .option('--only <names>', 'Plan only these units', collect)
  .option('--skip <names>', 'Leave these units out', collect)
  .action(async (options: ProfileOptions & { only?: string[]; skip?: string[] }) => {
    const startedAt = new Date().toISOString();
    const aw = createArtifactWriter(resolve(options.out));
    const log = commandLogger(aw, options);

    try {
      pruneArtifacts(options, aw, log);
      const profile = selectProfile(options);
      const config = loadConfig(
        profile,
        { workspace: options.workspace, interactive: false, only: options.only, skip: options.skip },
        { env: process.env, isTTY: false },
      );
      const env: Env = { ...process.env, WORKSPACE: config.workspace };

      const plan = await planProvisioning({ profile, config, env, exec: createCommandRunner(env), fetch, logger: log });
      aw.writeEvidence('plan', plan);
      const summary = aw.finalize({
        command: 'plan',
        profile: profile.profile_id,
        workspace: config.workspace,
        startedAt,
        exitCode: EXIT_SUCCESS,
        stats: { entries: plan.entries.length, skip_marker: plan.skipMarker },
      });

      if (options.json) {
        process.stdout.write(JSON.stringify({ summary, plan }, null, 2) + '\n');
      } else if (plan.skipMarker) {
        console.log(`\n${plan.skipMarker} exists, a run would do nothing.`);
      } else {
        console.log(`\nPlan for ${profile.name} (${config.workspace})`);
        for (const entry of plan.entries) {
          const where = entry.target ? ` -> ${entry.target}` : '';
          const note = entry.detail ? ` (${entry.detail})` : '';
          console.log(`  [${entry.action}] ${entry.unit}${where}${note}`);
        }
        console.log(`\nArtifacts: ${aw.dir}`);
      }

      process.exit(EXIT_SUCCESS);
    } catch (err) {
      handleError(err, 'plan', startedAt, aw, log, options.json);
    }
  });

// ---------------------------------------------------------------------------
// profiles: list bundled profiles
// ---------------------------------------------------------------------------

program
  .command('profiles')
  .description('List bundled profiles')
  .option('--show <id>', 'Print one profile as JSON')
  .option('--json', 'Emit structured JSON to stdout')
  .action((options: { show?: string; json?: boolean }) => {
    try {
      if (options.show) {
        process.stdout.write(serializeProfile(getProfile(options.show)) + '\n');
        return;
      }

      const profiles = listProfiles();
      if (options.json) {
        const rows = profiles.map((p) => ({ profile_id: p.profile_id, name: p.name, units: p.units.map((u) => u.name) }));
        process.stdout.write(JSON.stringify(rows, null, 2) + '\n');
        return;
      }
      for (const p of profiles) {
        console.log(`${p.profile_id.padEnd(12)} ${p.name} (${p.units.length} units)`);
      }
    } catch (err) {
      exitWithEnvelope(wrapError(err), options.json);
    }
  });

// ---------------------------------------------------------------------------
// token: probe a download credential
// ---------------------------------------------------------------------------

program
  .command('token')
  .description('Check whether the token held in an environment variable is accepted')
  .argument('[env]', 'Environment variable holding the token', 'HF_TOKEN')
  .option('--endpoint <url>', 'Endpoint that answers 200 for a valid token', DEFAULT_TOKEN_ENDPOINT)
  .option('--json', 'Emit structured JSON to stdout')
  .action(async (envName: string, options: { endpoint: string; json?: boolean }) => {
    try {
      const valid = await hasValidToken(process.env[envName], { endpoint: options.endpoint });
      if (options.json) {
        process.stdout.write(JSON.stringify({ env: envName, endpoint: options.endpoint, valid }, null, 2) + '\n');
      } else {
        console.log(valid ? `${envName}: valid` : `${envName}: missing or rejected`);
      }
      process.exit(valid ? EXIT_SUCCESS : EXIT_UNITS_FAILED);
    } catch (err) {
      exitWithEnvelope(wrapError(err), options.json);
    }
  });

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const confirmPrompt: RetryPrompt = (question) => confirm({ message: question, default: false });

function commandLogger(aw: ArtifactWriter, options: ProfileOptions): StructuredLogger {
  return createLogger({
    module: 'provision',
    filePath: aw.logsPath,
    echo: options.json ? 'json' : 'text',
    minLevel: options.verbose ? 'debug' : 'info',
    runId: aw.runId,
  });
}

function pruneArtifacts(options: ProfileOptions, aw: ArtifactWriter, log: StructuredLogger): void {
  const keep = Number(options.keepRuns);
  if (!Number.isInteger(keep) || keep < 1) {
    throw new ConfigError(`--keep-runs must be a positive integer, got "${options.keepRuns}"`);
  }
  const removed = pruneRuns(resolve(options.out), keep, aw.runId);
  if (removed.length > 0) {
    log.debug('artifacts.prune', `Removed ${removed.length} old run director${removed.length === 1 ? 'y' : 'ies'}`, { removed });
  }
}

function selectProfile(options: ProfileOptions): Profile {
  return options.profileFile ? loadProfileFile(resolve(options.profileFile)) : getProfile(options.profile);
}

function exitWithEnvelope(envelope: RunnerErrorEnvelope, json?: boolean): never {
  if (json) {
    process.stderr.write(JSON.stringify({ error: envelope }, null, 2) + '\n');
  } else {
    console.error(`Error [${envelope.code}]: ${envelope.userMessage}`);
    if (process.env.DEBUG && envelope.cause) {
      console.error(`  cause: ${envelope.cause}`);
    }
  }
  process.exit(exitCodeFor(envelope.code));
}

function handleError(
  err: unknown,
  command: string,
  startedAt: string,
  aw: ArtifactWriter,
  log: StructuredLogger,
  json?: boolean,
): never {
  const envelope = wrapError(err);
  log.error(`${command}.error`, envelope.userMessage, { code: envelope.code });

  aw.finalize({
    command,
    startedAt,
    exitCode: exitCodeFor(envelope.code),
    error: envelope,
  });

  exitWithEnvelope(envelope, json);
}

program.parseAsync().catch((err: unknown) => {
  exitWithEnvelope(wrapError(err));
});
