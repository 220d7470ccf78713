import { ANSI, colorize, wrapText, type AnsiColor } from '@taxoforge/shared';

import { summarizeFindings, type SeverityCounts } from './summarize.js';
import type { Finding, FindingSeverity, ValidationFindings } from './validator.js';

export interface FormatFindingsOptions {
  /** Append a per-rule pass/fail summary (default: true) */
  summarize?: boolean;
}

/** Plain-text report: one section per rule, then a summary. */
export class ValidationFormatter {
  formatFinding(finding: Finding): string {
    return `  [${finding.severity.toUpperCase()}] ${finding.message()}`;
  }

  format<C>(findings: ValidationFindings<C>, options: FormatFindingsOptions = {}): string {
    let output = '';
    for (const [rule, ruleFindings] of findings) {
      output += this.heading(rule.metadata.name);
      output += this.description(rule.metadata.description);
      if (ruleFindings.length === 0) {
        output += `  ${this.success()} No findings\n`;
      } else {
        for (const finding of ruleFindings) output += `${this.formatFinding(finding)}\n`;
      }
      output += '\n';
    }

    if (options.summarize ?? true) {
      output += this.heading('Summary');
      for (const [name, counts] of Object.entries(summarizeFindings(findings))) {
        output += `${this.summaryLine(name, counts)}\n`;
      }
      output += '\n';
    }
    return output;
  }

  protected heading(text: string): string {
    return ` ${text}\n${'-'.repeat(text.length * 2)}\n`;
  }

  protected description(_text: string | undefined): string {
    return '';
  }

  protected success(): string {
    return '[SUCCESS]';
  }

  protected summaryLine(name: string, counts: SeverityCounts): string {
    const status = counts.error === 0 && counts.fatal === 0 ? '[PASS]' : '[FAIL]';
    const tally = Object.entries(counts)
      .map(([severity, count]) => `${severity}: ${count}`)
      .join(', ');
    return `  ${status} ${name}: ${tally}`;
  }
}

const SEVERITY_COLORS: Record<FindingSeverity, AnsiColor> = {
  info: ANSI.cyan,
  warning: ANSI.yellow,
  error: ANSI.red,
  fatal: ANSI.red,
};

const paint = (text: string, color: AnsiColor): string => colorize(text, true, color);

function badge(label: string, color: AnsiColor): string {
  return `${paint('[', ANSI.bold)}${paint(label, color)}${paint(']', ANSI.bold)}`;
}

/** Terminal report with boxed headings, rule descriptions and status glyphs. */
export class ColoringValidationFormatter extends ValidationFormatter {
  constructor(private readonly lineLength = 80) {
    super();
  }

  override formatFinding(finding: Finding): string {
    const label = finding.severity.toUpperCase();
    return `  ${badge(label, SEVERITY_COLORS[finding.severity])} ${finding.message()}`;
  }

  protected override heading(text: string): string {
    const bar = '═'.repeat(text.length + 2);
    return [
      paint(`╔${bar}╗`, ANSI.cyan),
      `║ ${paint(text, ANSI.bold)} ║`,
      paint(`╚${bar}╝`, ANSI.cyan),
      '',
    ].join('\n');
  }

  protected override description(text: string | undefined): string {
    return text === undefined ? '\n' : `${wrapText(text, this.lineLength)}\n\n`;
  }

  protected override success(): string {
    return badge('SUCCESS', ANSI.green);
  }

  protected override summaryLine(name: string, counts: SeverityCounts): string {
    let status: string;
    if (counts.fatal > 0) status = paint('💣 FAIL', SEVERITY_COLORS.fatal);
    else if (counts.error > 0) status = paint('✗ FAIL', SEVERITY_COLORS.error);
    else if (counts.warning > 0) status = paint('! WARN', SEVERITY_COLORS.warning);
    else if (counts.info > 0) status = paint('ℹ PASS', SEVERITY_COLORS.info);
    else status = paint('✓ PASS', ANSI.green);
    return `  [ ${status} ] ${name}`;
  }
}
