/**
 * Pretty formátter pro CLI výstup - lidsky čitelný formát.
 */

import type { AdviceReport, FormattableData, ValidationReport } from '../types.js';
import type { OutputFormatter } from './index.js';
import type { AttributeValue, Conclusion } from '../../types/fact.js';
import type { FiringRecord } from '../../types/activation.js';

export class PrettyFormatter implements OutputFormatter {
  constructor(private readonly useColors: boolean = true) {}

  format(data: FormattableData): string {
    switch (data.type) {
      case 'validation':
        return this.formatValidation(data.data);
      case 'advice':
        return this.formatAdvice(data.data);
      case 'error':
        return this.color('✗ ', 'red') + this.color(data.data, 'red');
      case 'message':
        return data.data;
    }
  }

  private formatValidation(report: ValidationReport): string {
    const lines: string[] = [];

    lines.push(this.color(`File: ${report.file}`, 'bold'));
    lines.push(`Rules: ${report.ruleCount}`);
    lines.push('');

    if (report.valid && report.warningCount === 0) {
      lines.push(this.color('✓', 'green') + ' All rules are valid');
    } else if (report.valid) {
      lines.push(this.color('✓', 'green') + ` Valid with ${report.warningCount} warning(s)`);
    } else {
      lines.push(this.color(`✗ ${report.errorCount} error(s), ${report.warningCount} warning(s)`, 'red'));
    }

    if (report.errors.length > 0) {
      lines.push('');
      lines.push(this.color('Errors:', 'red'));
      for (const e of report.errors) {
        lines.push(`  ${this.color('✗', 'red')} ${this.color(e.path, 'cyan')}: ${e.message}`);
      }
    }

    if (report.warnings.length > 0) {
      lines.push('');
      lines.push(this.color('Warnings:', 'yellow'));
      for (const w of report.warnings) {
        lines.push(`  ${this.color('⚠', 'yellow')} ${this.color(w.path, 'cyan')}: ${w.message}`);
      }
    }

    return lines.join('\n');
  }

  private formatAdvice(report: AdviceReport): string {
    const lines: string[] = [
      this.color(`${report.conclusions.length} conclusion(s) after ${report.cycles} cycle(s)`, 'bold')
    ];

    if (report.conclusions.length === 0) {
      lines.push(this.color('No conclusions.', 'dim'));
    }

    // Skupiny podle druhu v pořadí prvního výskytu
    const groups = new Map<string, Conclusion[]>();
    for (const conclusion of report.conclusions) {
      const group = groups.get(conclusion.kind);
      if (group) {
        group.push(conclusion);
      } else {
        groups.set(conclusion.kind, [conclusion]);
      }
    }

    for (const [kind, conclusions] of groups) {
      lines.push('');
      lines.push(this.color(`${kind}:`, 'cyan'));
      for (const conclusion of conclusions) {
        lines.push(...this.formatConclusion(conclusion));
      }
    }

    if (report.firings) {
      lines.push('');
      lines.push(this.color('Firings:', 'cyan'));
      for (const firing of report.firings) {
        lines.push(`  ${this.formatFiring(firing)}`);
      }
    }

    return lines.join('\n');
  }

  private formatConclusion(conclusion: Conclusion): string[] {
    const { disease, confidence, notes, ...rest } = conclusion.attributes;

    if (typeof disease === 'string') {
      const lines = [
        `  • ${disease}` + (typeof confidence === 'number' ? this.color(` (confidence ${confidence})`, 'dim') : '')
      ];
      if (notes !== undefined) {
        lines.push(`    ${this.color(formatValue(notes), 'dim')}`);
      }
      for (const [key, value] of Object.entries(rest)) {
        lines.push(`    ${this.color(`${key}:`, 'dim')} ${formatValue(value)}`);
      }
      return lines;
    }

    const entries = Object.entries(conclusion.attributes);
    if (entries.length === 0) {
      return [`  • ${this.color('(no attributes)', 'dim')}`];
    }
    return entries.map(([key, value], i) =>
      `${i === 0 ? '  • ' : '    '}${this.color(`${key}:`, 'dim')} ${formatValue(value)}`
    );
  }

  private formatFiring(firing: FiringRecord): string {
    const facts = firing.factIds.map((id) => `#${id}`).join(', ');
    let line = `${firing.cycle}. ${firing.ruleName} ${this.color(`[${facts}]`, 'dim')}`;
    if (firing.assertedIds.length > 0) {
      line += ` +${firing.assertedIds.map((id) => `#${id}`).join(' +')}`;
    }
    if (firing.retractedIds.length > 0) {
      line += ` -${firing.retractedIds.map((id) => `#${id}`).join(' -')}`;
    }
    if (firing.skipped > 0) {
      line += this.color(` (${firing.skipped} skipped)`, 'yellow');
    }
    return line;
  }

  private color(text: string, style: ColorStyle): string {
    if (!this.useColors) {
      return text;
    }
    const codes: Record<ColorStyle, string> = {
      bold: '\x1b[1m',
      dim: '\x1b[2m',
      red: '\x1b[31m',
      green: '\x1b[32m',
      yellow: '\x1b[33m',
      cyan: '\x1b[36m'
    };
    return `${codes[style]}${text}\x1b[0m`;
  }
}

type ColorStyle = 'bold' | 'dim' | 'red' | 'green' | 'yellow' | 'cyan';

function formatValue(value: AttributeValue | undefined): string {
  if (Array.isArray(value)) {
    return value.map((item) => String(item)).join(', ');
  }
  return String(value);
}
