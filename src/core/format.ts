import type { ArrowError } from './errors.js';
import type { ValueRangeError } from './types.js';

export type OutputFormat = 'text' | 'json';

export interface Diagnostic {
  severity: 'error' | 'warning';
  code: string;
  message: string;
  hint?: string;
  field?: string;
}

export function fromArrowError(err: ArrowError): Diagnostic {
  return { severity: 'error', code: err.code, message: err.message, hint: err.hint };
}

export function fromValueRange(w: ValueRangeError): Diagnostic {
  return { severity: 'warning', code: w.code, message: w.message, hint: w.hint, field: w.field };
}

export function groupDiagnostics(diagnostics: Diagnostic[]) {
  const errs = diagnostics.filter(d => d.severity === 'error');
  const warns = diagnostics.filter(d => d.severity === 'warning');
  return { errs, warns };
}

export function textReport(source: string, diagnostics: Diagnostic[], color = true): string {
  const { errs, warns } = groupDiagnostics(diagnostics);
  const paint = (code: string, text: string) => (color ? `\x1b[${code}m${text}\x1b[0m` : text);
  const lines: string[] = [];
  const printBlock = (d: Diagnostic) => {
    const kind = d.severity === 'error' ? paint('31', 'error') : paint('33', 'warning');
    lines.push(`${kind}[${d.code}]: ${d.message}`);
    lines.push(d.field ? `at ${source} (${d.field})` : `at ${source}`);
    if (d.hint) {
      const [first, ...rest] = d.hint.split(/\r?\n/);
      lines.push(`hint: ${first}`);
      for (const line of rest) lines.push(`  ${line}`);
    }
    lines.push('');
  };
  for (const e of errs) printBlock(e);
  for (const w of warns) printBlock(w);
  return lines.join('\n');
}

export function toJsonResult(source: string, diagnostics: Diagnostic[]) {
  const { errs, warns } = groupDiagnostics(diagnostics);
  return {
    source,
    valid: errs.length === 0,
    errorCount: errs.length,
    warningCount: warns.length,
    errors: errs,
    warnings: warns,
  };
}
