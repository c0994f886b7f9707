import { getEvaluationConfig, type EvaluationConfig, type ReportFormat } from './config/evaluation';
import { evaluate } from './evaluation/evaluate';
import { loadFieldSpecs } from './evaluation/fieldSpecs';
import { loadEvaluationInput } from './evaluation/loaders';
import { renderJsonReport, renderMarkdownReport } from './evaluation/report';
import { defaultLogger, type Logger } from './utils/logger';

export const USAGE = [
  'Usage: npm run evaluate -- --predicted <file> --gold <file> [options]',
  '',
  'Options:',
  '  --fields <file>            Field registry (default: $EVAL_FIELD_SPECS or config/characterisation-fields.json)',
  '  --format markdown|json     Report format (default: $EVAL_REPORT_FORMAT or markdown)',
  '  --title <text>             Report title',
  '  --debug                    Include per-field mismatch details',
].join('\n');

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliOptions {
  predictedPath: string;
  goldPath: string;
  fieldsPath: string;
  format: ReportFormat;
  title: string;
  debug: boolean;
}

const VALUE_FLAGS = ['--predicted', '--gold', '--fields', '--format', '--title'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(arg: string): arg is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === arg);
}

export function parseCliArgs(
  args: readonly string[],
  config: EvaluationConfig = getEvaluationConfig()
): CliOptions {
  const values = new Map<ValueFlag, string>();
  let debug = config.debug;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--debug') {
      debug = true;
      continue;
    }
    if (!isValueFlag(arg)) {
      throw new UsageError(`Unknown argument: ${arg}`);
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`Missing value for ${arg}`);
    }
    values.set(arg, value);
    i += 1;
  }

  const predictedPath = values.get('--predicted');
  const goldPath = values.get('--gold');
  if (!predictedPath || !goldPath) {
    throw new UsageError('Both --predicted and --gold are required');
  }

  const format = values.get('--format') ?? config.reportFormat;
  if (format !== 'markdown' && format !== 'json') {
    throw new UsageError(`Unsupported format: ${format}`);
  }

  return {
    predictedPath,
    goldPath,
    fieldsPath: values.get('--fields') ?? config.fieldSpecsPath,
    format,
    title: values.get('--title') ?? 'Extraction Scoring',
    debug,
  };
}

export async function runEvaluation(options: CliOptions, logger: Logger = defaultLogger): Promise<string> {
  const fields = await loadFieldSpecs(options.fieldsPath);
  const predicted = await loadEvaluationInput(options.predictedPath, logger);
  const gold = await loadEvaluationInput(options.goldPath, logger);

  const hasSequences = predicted.sequences.size > 0 || gold.sequences.size > 0;
  const result = evaluate(
    {
      predicted: predicted.records,
      gold: gold.records,
      fields,
      predictedSequences: hasSequences ? predicted.sequences : undefined,
      goldSequences: hasSequences ? gold.sequences : undefined,
    },
    { debug: options.debug }
  );

  logger.info(
    `Scored ${result.anchors.matched.length} matched, ${result.anchors.missing.length} missing, ${result.anchors.extra.length} extra anchors`
  );

  return options.format === 'json'
    ? renderJsonReport(result)
    : renderMarkdownReport(result, options.title);
}
