/**
 * Check Command
 *
 * Pre-flight check of the tracing setup:
 *   search-obs check          - Show resolved configuration and export state
 *   search-obs check --json   - Output as JSON
 *
 * Steps:
 * 1. Read the environment (API key shown masked)
 * 2. Run configure() exactly as the service would
 * 3. Report enabled/disabled and why
 * 4. Shut the exporter down again
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { getApiKeyFromEnv, loadEnv, SETUP_INSTRUCTIONS } from '../../config/env.js';
import { ConfigError, ExporterError } from '../../errors/index.js';
import { configure, shutdown } from '../../observability/state.js';
import type { ExporterState } from '../../observability/types.js';

// ============================================================================
// Types
// ============================================================================

interface CheckResultJSON {
  status: ExporterState['status'];
  reason: ExporterState['reason'] | null;
  apiKey: string | null;
  serviceName: string;
  endpoint: string;
  datasetName: string | null;
  sampleRatio: number;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Mask an API key for display: first 8 and last 4 characters, or "***"
 * for keys too short to mask safely.
 */
export function maskApiKey(apiKey: string): string {
  if (apiKey.length <= 12) {
    return '***';
  }
  return `${apiKey.slice(0, 8)}...${apiKey.slice(-4)}`;
}

function throwIfExporterFailed(state: ExporterState): void {
  if (state.reason === 'exporter-failed') {
    throw new ExporterError('Trace export could not start');
  }
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the check command
 */
export function createCheckCommand(
  getContext: () => CommandContext
): Command {
  return new Command('check')
    .description('Check tracing configuration and export readiness')
    .action(async () => {
      const ctx = getContext();
      const apiKey = getApiKeyFromEnv();
      const env = loadEnv();

      ctx.debug('Running configure() with environment settings');
      const state = configure({}, ctx);
      await shutdown();

      if (state.reason === 'invalid-config') {
        throw new ConfigError(
          'Tracing configuration is invalid',
          'Fix the variables reported above and run: search-obs check'
        );
      }

      if (ctx.options.json) {
        const output: CheckResultJSON = {
          status: state.status,
          reason: state.reason ?? null,
          apiKey: apiKey ? maskApiKey(apiKey) : null,
          serviceName: state.serviceName,
          endpoint: state.endpoint,
          datasetName: state.datasetName ?? null,
          sampleRatio: state.sampleRatio,
        };
        console.log(JSON.stringify(output, null, 2));
        throwIfExporterFailed(state);
        return;
      }

      const lines: string[] = [];
      lines.push(chalk.bold('Tracing configuration'));
      lines.push(chalk.dim('─'.repeat(40)));
      lines.push(
        `${chalk.cyan('API key:')}      ` +
          (apiKey ? maskApiKey(apiKey) : chalk.yellow('not set (export disabled)'))
      );
      lines.push(`${chalk.cyan('Service:')}      ${state.serviceName}`);
      lines.push(`${chalk.cyan('Endpoint:')}     ${state.endpoint}`);
      if (state.datasetName) {
        lines.push(`${chalk.cyan('Dataset:')}      ${state.datasetName} (legacy dataset-scoped account)`);
      }
      lines.push(`${chalk.cyan('Sample ratio:')} ${state.sampleRatio}`);
      if (env.OTEL_EXPORTER_OTLP_HEADERS && !env.HONEYCOMB_API_KEY && apiKey) {
        lines.push(chalk.dim('API key read from OTEL_EXPORTER_OTLP_HEADERS'));
      }

      lines.push('');
      if (state.status === 'enabled') {
        lines.push(chalk.green('Trace export is enabled.'));
      } else if (state.reason === 'missing-credential') {
        lines.push(chalk.yellow('Trace export is disabled: no API key found.'));
        lines.push('');
        lines.push(chalk.dim(SETUP_INSTRUCTIONS));
      } else {
        lines.push(chalk.red('Trace export is disabled: the exporter could not be created.'));
      }

      ctx.log(lines.join('\n'));
      throwIfExporterFailed(state);
    });
}
