import { diffEntries, type ChangedSchema } from '../../compare/model.js';
import { Finding, type Rule, type RuleMetadata } from '../validator.js';
import { changedRecords, type CompatibilityContext, type RecordRoot } from './context.js';

export class AddedRequiredAttrFinding extends Finding {
  readonly id = 'AddedRequiredAttr';

  constructor(
    readonly root: RecordRoot,
    readonly path: readonly [string, string]
  ) {
    super();
  }

  message(): string {
    return `New required attribute added to ${this.root} ${this.path.join('.')}`;
  }
}

function inAddedProfile(attr: string, change: ChangedSchema): boolean {
  return diffEntries(change.profiles).some(
    ([, profile]) => profile.kind === 'addition' && attr in profile.after.attributes
  );
}

export class NoAddedRequiredAttrsRule implements Rule<CompatibilityContext> {
  readonly metadata: RuleMetadata = {
    name: 'No added required attributes',
    description:
      'Records written against an older schema lack any attribute added since, so a ' +
      'new attribute on an existing event or object must be optional or recommended. ' +
      'New profiles may add required attributes: no older record uses them.',
  };

  validate({ change }: CompatibilityContext): Finding[] {
    const findings: Finding[] = [];
    for (const { name, root, record } of changedRecords(change)) {
      for (const [attrName, attr] of diffEntries(record.attributes)) {
        if (attr.kind !== 'addition' || attr.after.requirement !== 'required') continue;
        if (inAddedProfile(attrName, change)) continue;
        findings.push(new AddedRequiredAttrFinding(root, [name, attrName]));
      }
    }

    // Without profiles there is no telling whether a new profile brought the attribute.
    if (diffEntries(change.profiles).length === 0) {
      for (const finding of findings) finding.severity = 'warning';
    }
    return findings;
  }
}
