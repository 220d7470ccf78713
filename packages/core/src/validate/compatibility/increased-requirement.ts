import { diffEntries } from '../../compare/model.js';
import { ElementType } from '../../schema/model.js';
import { Finding, type Rule, type RuleMetadata } from '../validator.js';
import { changedRecords, type CompatibilityContext, type RecordRoot } from './context.js';

export class IncreasedRequirementFinding extends Finding {
  readonly id = 'IncreasedRequirement';

  constructor(
    readonly root: RecordRoot,
    readonly path: readonly [string, string],
    readonly before: string,
    readonly after: string
  ) {
    super();
  }

  message(): string {
    return (
      `Requirement of ${this.root} ${this.path.join('.')} changed ` +
      `from ${this.before} to ${this.after}`
    );
  }
}

// Event attributes the compiler itself fills in.
const EXEMPT_EVENT_ATTRS = new Set(['category_uid', 'activity_id', 'class_uid']);

export class NoIncreasedRequirementsRule implements Rule<CompatibilityContext> {
  readonly metadata: RuleMetadata = {
    name: 'No increased requirements',
    description:
      'Making an existing attribute required invalidates records that leave it out. ' +
      'Raising a requirement from optional to recommended is compatible.',
  };

  validate({ change }: CompatibilityContext): Finding[] {
    const findings: Finding[] = [];
    for (const { name, root, record } of changedRecords(change)) {
      for (const [attrName, attr] of diffEntries(record.attributes)) {
        if (attr.kind !== 'changed' || attr.requirement.kind !== 'change') continue;
        if (attr.requirement.after !== 'required') continue;
        if (root === ElementType.EVENT && EXEMPT_EVENT_ATTRS.has(attrName)) continue;
        findings.push(
          new IncreasedRequirementFinding(
            root,
            [name, attrName],
            attr.requirement.before,
            attr.requirement.after
          )
        );
      }
    }
    return findings;
  }
}
