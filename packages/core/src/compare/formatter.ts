import { ANSI, colorize, isRecord, shorten } from '@taxoforge/shared';

import type { ChangedModel } from './model.js';

export interface FormatOptions {
  /** Print a change as one `~` line instead of a `+` and a `-` line (default: true) */
  collapseChanges?: boolean;
  colors?: boolean;
}

const WIDTH = 80;
const COLLAPSED_WIDTH = 35;

/**
 * Render a diff tree as diff-style lines:
 *
 *   + classes.login.attributes.user: {caption: User, ...}
 *   - objects.device: {caption: Device, name: device, attributes: {}}
 *   ~ version: 1.0.0 => 1.1.0
 *
 * Fields of a `changed` node are visited in name order, dictionary keys in
 * their diff order. Unchanged values print nothing.
 */
export function formatDifference(changed: ChangedModel, options: FormatOptions = {}): string[] {
  const lines: string[] = [];
  visitFields(changed, [], {
    collapse: options.collapseChanges ?? true,
    colors: options.colors ?? false,
    emit: (line) => lines.push(line),
  });
  return lines;
}

interface Visitor {
  collapse: boolean;
  colors: boolean;
  emit: (line: string) => void;
}

function visitFields(node: Record<string, unknown>, path: string[], visitor: Visitor): void {
  for (const field of Object.keys(node).sort()) {
    if (field === 'kind' || field === 'model') continue;
    visit(node[field], [...path, field], visitor);
  }
}

function visit(node: unknown, path: string[], visitor: Visitor): void {
  if (!isRecord(node)) return;
  const name = path.join('.');
  const { colors, emit } = visitor;

  switch (node.kind) {
    case 'addition':
      emit(colorize(`+ ${name}: ${display(node.after)}`, colors, ANSI.green));
      return;
    case 'removal':
      emit(colorize(`- ${name}: ${display(node.before)}`, colors, ANSI.red));
      return;
    case 'change':
      if (visitor.collapse) {
        const was = display(node.before, COLLAPSED_WIDTH);
        const now = display(node.after, COLLAPSED_WIDTH);
        emit(colorize(`~ ${name}: ${was} => ${now}`, colors, ANSI.cyan));
      } else {
        emit(colorize(`+ ${name}: ${display(node.after)}`, colors, ANSI.green));
        emit(colorize(`- ${name}: ${display(node.before)}`, colors, ANSI.red));
      }
      return;
    case 'changed':
      visitFields(node, path, visitor);
      return;
    case 'map':
      if (isRecord(node.entries)) {
        for (const [key, entry] of Object.entries(node.entries)) {
          visit(entry, [...path, key], visitor);
        }
      }
      return;
    default:
      return;
  }
}

function display(value: unknown, width = WIDTH): string {
  return shorten(render(value), width);
}

function render(value: unknown): string {
  if (value === undefined) return 'none';
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return `[${value.map(render).join(', ')}]`;
  if (isRecord(value)) {
    const fields = Object.entries(value).map(([key, item]) => `${key}: ${render(item)}`);
    return `{${fields.join(', ')}}`;
  }
  return String(value);
}
