#!/usr/bin/env node
import 'dotenv/config';
import { USAGE, UsageError, parseCliArgs, runEvaluation, type CliOptions } from './cli';
import { FieldSpecError, InputReadError, InputValidationError } from './evaluation/errors';
import { defaultLogger } from './utils/logger';

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      console.error(USAGE);
      process.exit(1);
    }
    throw error;
  }

  try {
    const report = await runEvaluation(options, defaultLogger);
    console.log(report);
  } catch (error) {
    if (
      error instanceof FieldSpecError ||
      error instanceof InputValidationError ||
      error instanceof InputReadError
    ) {
      defaultLogger.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

export { evaluate } from './evaluation/evaluate';
export type { EvaluationInput, EvaluationOptions } from './evaluation/evaluate';
export { partitionAnchors, scoreUnmatchedField } from './evaluation/anchorMatcher';
export {
  compareField,
  parseNumbers,
  parsePercentSeries,
  matchWithTolerance,
} from './evaluation/comparators';
export { ConfusionAccumulator, deriveRates } from './evaluation/confusion';
export { alignSequence, alignSequences } from './evaluation/sequenceAligner';
export { loadFieldSpecs, parseFieldSpecs } from './evaluation/fieldSpecs';
export { loadEvaluationInput, parseEvaluationInput, indexRecords, indexSequences } from './evaluation/loaders';
export { renderMarkdownReport, renderJsonReport } from './evaluation/report';
export * from './evaluation/errors';
export * from './evaluation/types';
export { normalizeText, normalizeFormula, isNotApplicable } from './utils/normalize';
