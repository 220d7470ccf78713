import { ANSI, colorize, wrapText } from '@taxoforge/shared';
import type { CLIErrorView } from '@taxoforge/core';

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const lines: string[] = [];

  lines.push(colorize(`❌ ${view.title}`, view.colors, ANSI.bold, ANSI.red));

  if (view.location) {
    lines.push(wrapText(`📍 ${view.location}`, width));
  }
  if (view.target) {
    lines.push(wrapText(`🎯 Target: ${view.target}`, width));
  }
  if (view.operation) {
    // Operation descriptions name paths; keep them on one line for copy/paste
    lines.push(`🔧 Operation: ${view.operation}`);
  }
  if (view.cause) {
    lines.push(colorize(wrapText(`Caused by: ${view.cause}`, width), view.colors, ANSI.dim));
  }

  return lines.join('\n');
}

export default renderCLIView;
