import type { EvaluationResult, ScoredCounts } from './types';

const TABLE_HEADER = '| TP | FP | FN | Precision | Recall | F1 |';
const TABLE_ALIGN = '|---:|---:|---:|---:|---:|---:|';

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function row(label: string, { counts, precision, recall, f1 }: ScoredCounts): string {
  return `| ${escapeCell(label)} | ${counts.tp} | ${counts.fp} | ${counts.fn} | ${precision.toFixed(3)} | ${recall.toFixed(3)} | ${f1.toFixed(3)} |`;
}

export function formatOverall({ counts, precision, recall, f1 }: ScoredCounts): string {
  return `Overall: TP=${counts.tp}, FP=${counts.fp}, FN=${counts.fn}, Precision=${precision.toFixed(3)}, Recall=${recall.toFixed(3)}, F1=${f1.toFixed(3)}`;
}

function anchorLine(label: string, anchors: readonly string[]): string {
  return `${label} (${anchors.length}): ${anchors.length > 0 ? anchors.join(', ') : '-'}`;
}

export function renderMarkdownReport(result: EvaluationResult, title: string): string {
  const out: string[] = [];
  out.push(`# ${title}`, '');

  out.push(`| Field ${TABLE_HEADER}`, `|---${TABLE_ALIGN}`);
  for (const field of result.fields) {
    out.push(row(field.field, field));
  }
  out.push('', formatOverall(result.overall), '');

  out.push('## Anchors', '');
  out.push(anchorLine('Matched', result.anchors.matched));
  out.push(anchorLine('Missing', result.anchors.missing));
  out.push(anchorLine('Extra', result.anchors.extra), '');

  if (result.perAnchor.length > 0) {
    out.push('## Per anchor', '');
    out.push(`| Anchor ${TABLE_HEADER}`, `|---${TABLE_ALIGN}`);
    for (const anchor of result.perAnchor) {
      out.push(row(anchor.anchor, anchor));
    }
    out.push('');
  }

  if (result.sequences) {
    out.push('## Steps', '');
    out.push(`| Anchor ${TABLE_HEADER}`, `|---${TABLE_ALIGN}`);
    for (const anchor of result.sequences.anchors) {
      out.push(row(anchor.anchor, anchor));
    }
    out.push('', formatOverall(result.sequences.overall), '');
  }

  if (result.mismatches && result.mismatches.length > 0) {
    out.push('## Mismatches', '');
    for (const mismatch of result.mismatches) {
      out.push(
        `- ${mismatch.anchor} ${mismatch.field}: pred='${mismatch.predicted || 'N/A'}' vs gt='${mismatch.gold || 'N/A'}'`
      );
    }
    out.push('');
  }

  return out.join('\n');
}

export function renderJsonReport(result: EvaluationResult): string {
  return JSON.stringify(result, null, 2);
}
