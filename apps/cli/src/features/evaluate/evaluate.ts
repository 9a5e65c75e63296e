import type { OverallRiskColor } from '@withdrawal-audit/scoring';
import type { Command } from 'commander';
import pc from 'picocolors';

import { exitCodeOf } from '../shared/cli-error.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { EvaluateCommandOptionsSchema } from '../shared/schemas.js';

import { EvaluateHandler, type EvaluateResult } from './evaluate-handler.js';
import {
  buildEvaluateParams,
  countByRisk,
  formatEvaluationLines,
  formatRiskCounts,
  toEvaluationSummary,
  type EvaluationSummary,
  type RiskCounts,
} from './evaluate-utils.js';

const COMMAND = 'evaluate';

/**
 * Evaluate command result data (JSON mode).
 */
interface EvaluateCommandResult {
  profile: string;
  config: EvaluateResult['config'];
  counts: RiskCounts;
  records: EvaluationSummary[];
}

/**
 * Register the evaluate command.
 */
export function registerEvaluateCommand(program: Command): void {
  program
    .command(COMMAND)
    .description('Score withdrawal measurements from a JSON file')
    .argument('<file>', 'JSON file holding one measurement or an array of measurements')
    .option('--profile <name>', 'Threshold profile (default|strict)')
    .option('--config <file>', 'JSON file with threshold overrides applied on top of the profile')
    .option('--json', 'Output results in JSON format')
    .action(async (file: string, rawOptions: unknown) => {
      await executeEvaluateCommand(file, rawOptions);
    });
}

/**
 * Execute the evaluate command.
 */
async function executeEvaluateCommand(file: string, rawOptions: unknown): Promise<void> {
  // Check for --json flag early (even before validation) to determine output format
  const isJsonMode =
    typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;

  const validationResult = EvaluateCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager(isJsonMode ? 'json' : 'text');
    const firstError = validationResult.error.issues[0];
    output.error(COMMAND, new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
    return;
  }

  const options = validationResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const paramsResult = buildEvaluateParams(file, options);
  if (paramsResult.isErr()) {
    output.error(COMMAND, paramsResult.error, paramsResult.error.exitCode);
    return;
  }

  try {
    const handler = new EvaluateHandler();
    const result = await handler.execute(paramsResult.value);

    if (result.isErr()) {
      output.error(COMMAND, result.error, result.error.exitCode);
      return; // TypeScript needs this even though output.error never returns
    }

    handleEvaluateSuccess(output, result.value);
  } catch (error) {
    const failure = error instanceof Error ? error : new Error(String(error));
    output.error(COMMAND, failure, exitCodeOf(failure));
  }
}

function colorizeRisk(label: string, color: OverallRiskColor): string {
  switch (color) {
    case 'red':
      return pc.red(label);
    case 'orange':
      return pc.yellow(label);
    case 'green':
      return pc.green(label);
  }
}

/**
 * Handle successful evaluation.
 */
function handleEvaluateSuccess(output: OutputManager, evaluateResult: EvaluateResult): void {
  const summaries = evaluateResult.records.map(toEvaluationSummary);
  const counts = countByRisk(summaries);

  if (output.isJsonMode()) {
    const resultData: EvaluateCommandResult = {
      profile: evaluateResult.profile,
      config: evaluateResult.config,
      counts,
      records: summaries,
    };
    output.json(COMMAND, resultData);
    return;
  }

  output.intro(`withdrawal-audit evaluate (${evaluateResult.profile} profile)`);

  for (const summary of summaries) {
    output.note(
      formatEvaluationLines(summary).join('\n'),
      `${summary.id}  ${colorizeRisk(summary.overallLabel, summary.overallColor)}`
    );

    if (summary.fxError) {
      output.warn(`${summary.id}: FX figures rejected (${summary.fxError}); FX scored as missing data`);
    }
  }

  output.outro(formatRiskCounts(counts));
}
