export const DEFAULT_BAND_TOLERANCE = 3;
export const DEFAULT_PERCENT_PRECISION = 2;
export const DEFAULT_SET_DELIMITER = '[;\\n]';

export const DEFAULT_FIELD_SPECS_PATH = 'config/characterisation-fields.json';

export type ReportFormat = 'markdown' | 'json';

export interface EvaluationConfig {
  debug: boolean;
  reportFormat: ReportFormat;
  fieldSpecsPath: string;
}

export function getEvaluationConfig(): EvaluationConfig {
  return {
    debug: process.env.EVAL_DEBUG === '1' || process.env.EVAL_DEBUG === 'true',
    reportFormat: process.env.EVAL_REPORT_FORMAT === 'json' ? 'json' : 'markdown',
    fieldSpecsPath: process.env.EVAL_FIELD_SPECS || DEFAULT_FIELD_SPECS_PATH,
  };
}
