import { diffEntries } from '../../compare/model.js';
import type { Schema } from '../../schema/model.js';
import { Finding, type Rule, type RuleMetadata } from '../validator.js';
import { changedRecords, type CompatibilityContext, type RecordRoot } from './context.js';

export class ChangedTypeFinding extends Finding {
  readonly id = 'ChangedType';

  constructor(
    readonly root: RecordRoot,
    readonly record: string,
    readonly attr: string,
    readonly before: string,
    readonly after: string
  ) {
    super();
  }

  message(): string {
    return (
      `Type of ${this.root} ${this.record}.${this.attr} ` +
      `changed from ${this.before} to ${this.after}`
    );
  }
}

/** Type changes that no encoding can break on. */
const WIDENINGS: ReadonlyArray<readonly [string, string]> = [['integer_t', 'long_t']];

function isAllowed(before: string, after: string, context: CompatibilityContext): boolean {
  if (WIDENINGS.some(([from, to]) => from === before && to === after)) return true;
  const base = (schema: Schema, type: string) => schema.types[type]?.type;
  const was = base(context.before, before);
  return was !== undefined && was === base(context.after, after);
}

export class NoChangedTypesRule implements Rule<CompatibilityContext> {
  readonly metadata: RuleMetadata = {
    name: 'No changed attribute types',
    description:
      'Some encodings depend on the data type of an attribute, so changing it is a ' +
      'breaking change. Widening an integer to a long, and switching between types ' +
      'with the same base type, are allowed.',
  };

  validate(context: CompatibilityContext): Finding[] {
    const findings: Finding[] = [];
    for (const { name, root, record } of changedRecords(context.change)) {
      for (const [attrName, attr] of diffEntries(record.attributes)) {
        if (attr.kind !== 'changed' || attr.type.kind !== 'change') continue;
        const { before, after } = attr.type;
        if (isAllowed(before, after, context)) continue;
        findings.push(new ChangedTypeFinding(root, name, attrName, before, after));
      }
    }
    return findings;
  }
}
