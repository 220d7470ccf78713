import { diffEntries } from '../../compare/model.js';
import { Finding, type Rule, type RuleMetadata } from '../validator.js';
import { changedEvents, type CompatibilityContext } from './context.js';

export class ChangedClassUidFinding extends Finding {
  readonly id = 'ChangedClassUid';

  constructor(
    readonly event: string,
    readonly before: string,
    readonly after: string
  ) {
    super();
  }

  message(): string {
    return `The Class ID of ${this.event} changed from ${this.before} to ${this.after}`;
  }
}

/**
 * A class ID shows up as the single key of the `class_uid` enum, so a
 * changed ID is an enum member removed while another is added.
 */
export class NoChangedClassUidsRule implements Rule<CompatibilityContext> {
  readonly metadata: RuleMetadata = {
    name: 'No changed class UIDs',
    description:
      'Class IDs identify event classes and must stay fixed. They usually change when ' +
      'a class moves to another category, or from an extension into the core schema.',
  };

  validate({ change }: CompatibilityContext): Finding[] {
    const findings: Finding[] = [];
    for (const { name, record } of changedEvents(change)) {
      const uid = diffEntries(record.attributes).find(([attr]) => attr === 'class_uid')?.[1];
      if (uid?.kind !== 'changed') continue;

      let before: string | undefined;
      let after: string | undefined;
      for (const [key, member] of diffEntries(uid.enum)) {
        if (member.kind === 'removal') before = key;
        else if (member.kind === 'addition') after = key;
      }
      if (before !== undefined && after !== undefined) {
        findings.push(new ChangedClassUidFinding(name, before, after));
      }
    }
    return findings;
  }
}
