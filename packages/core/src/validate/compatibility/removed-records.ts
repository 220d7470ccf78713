/**
 * Removed and renamed events, objects, attributes and enum members.
 *
 * A removal counts as a rename when the same collection gains an element
 * with the same caption (or, for events, the same `class_uid` attribute).
 * Each kind of element has its own finding classes so that their severities
 * can be configured separately.
 */

import { deepEqual } from '@taxoforge/shared';

import { diffEntries } from '../../compare/model.js';
import { ElementType, type Attr, type EnumMember, type Event } from '../../schema/model.js';
import { Finding, type Rule, type RuleMetadata } from '../validator.js';
import { changedRecords, type CompatibilityContext, type RecordRoot } from './context.js';

function elementPath(root: RecordRoot, name: string, path: readonly string[]): string {
  return `${root}:${[...path, name].join('.')}`;
}

abstract class RemovedRecordFinding extends Finding {
  constructor(
    readonly name: string,
    readonly caption: string,
    readonly root: RecordRoot = ElementType.EVENT,
    readonly path: readonly string[] = []
  ) {
    super();
  }

  message(): string {
    return `${elementPath(this.root, this.name, this.path)} (${this.caption}) was removed`;
  }
}

export class RemovedEventFinding extends RemovedRecordFinding {
  readonly id = 'RemovedEvent';
}

export class RemovedObjectFinding extends RemovedRecordFinding {
  readonly id = 'RemovedObject';

  constructor(name: string, caption: string) {
    super(name, caption, ElementType.OBJECT);
  }
}

export class RemovedAttrFinding extends RemovedRecordFinding {
  readonly id = 'RemovedAttr';
}

export class RemovedEnumMemberFinding extends RemovedRecordFinding {
  readonly id = 'RemovedEnumMember';
}

abstract class RenamedRecordFinding extends Finding {
  constructor(
    readonly before: string,
    readonly after: string,
    readonly caption: string,
    readonly root: RecordRoot = ElementType.EVENT,
    readonly path: readonly string[] = []
  ) {
    super();
  }

  message(): string {
    const from = elementPath(this.root, this.before, this.path);
    const to = elementPath(this.root, this.after, this.path);
    return `${from} (${this.caption}) appears to have been renamed to ${to}`;
  }
}

export class RenamedEventFinding extends RenamedRecordFinding {
  readonly id = 'RenamedEvent';
}

export class RenamedObjectFinding extends RenamedRecordFinding {
  readonly id = 'RenamedObject';

  constructor(before: string, after: string, caption: string) {
    super(before, after, caption, ElementType.OBJECT);
  }
}

export class RenamedAttrFinding extends RenamedRecordFinding {
  readonly id = 'RenamedAttr';
}

export class RenamedEnumMemberFinding extends RenamedRecordFinding {
  readonly id = 'RenamedEnumMember';
}

type Added<T> = Array<[string, T]>;

function isRenamedEvent(removed: Event, added: Event): boolean {
  if (added.caption === removed.caption) return true;
  const before = removed.attributes.class_uid;
  const after = added.attributes.class_uid;
  return before !== undefined && after !== undefined && deepEqual(before, after);
}

export class NoRemovedRecordsRule implements Rule<CompatibilityContext> {
  readonly metadata: RuleMetadata = {
    name: 'No removed or renamed schema elements',
    description:
      'Removing an event, an object, an attribute or an enum member breaks consumers ' +
      'that still produce or read it; deprecate it instead. A rename removes the old ' +
      'name just the same, so it is a breaking change too.',
  };

  validate({ change }: CompatibilityContext): Finding[] {
    const findings: Finding[] = [];

    const classes = diffEntries(change.classes);
    const addedEvents = classes.flatMap(([, diff]) => (diff.kind === 'addition' ? [diff.after] : []));
    for (const [name, diff] of classes) {
      if (diff.kind !== 'removal') continue;
      const removed = diff.before;
      const renamed = addedEvents.find((added) => isRenamedEvent(removed, added));
      findings.push(
        renamed
          ? new RenamedEventFinding(removed.name, renamed.name, removed.caption)
          : new RemovedEventFinding(name, removed.caption)
      );
    }

    const objects = diffEntries(change.objects);
    const addedObjects = objects.flatMap(([, diff]) => (diff.kind === 'addition' ? [diff.after] : []));
    for (const [name, diff] of objects) {
      if (diff.kind !== 'removal') continue;
      const removed = diff.before;
      const renamed = addedObjects.find((added) => added.caption === removed.caption);
      findings.push(
        renamed
          ? new RenamedObjectFinding(removed.name, renamed.name, removed.caption)
          : new RemovedObjectFinding(name, removed.caption)
      );
    }

    for (const { name, root, record } of changedRecords(change)) {
      const attributes = diffEntries(record.attributes);
      const addedAttrs = attributes.flatMap(([key, diff]): Added<Attr> =>
        diff.kind === 'addition' ? [[key, diff.after]] : []
      );
      for (const [attrName, attr] of attributes) {
        if (attr.kind === 'removal') {
          const caption = attr.before.caption;
          const renamed = addedAttrs.find(([, added]) => added.caption === caption);
          findings.push(
            renamed
              ? new RenamedAttrFinding(attrName, renamed[0], caption, root, [name])
              : new RemovedAttrFinding(attrName, caption, root, [name])
          );
          continue;
        }
        if (attr.kind !== 'changed') continue;

        const members = diffEntries(attr.enum);
        const addedMembers = members.flatMap(([key, diff]): Added<EnumMember> =>
          diff.kind === 'addition' ? [[key, diff.after]] : []
        );
        for (const [key, member] of members) {
          if (member.kind !== 'removal') continue;
          const caption = member.before.caption;
          const renamed = addedMembers.find(([, added]) => added.caption === caption);
          const path = [name, attrName];
          findings.push(
            renamed
              ? new RenamedEnumMemberFinding(key, renamed[0], caption, root, path)
              : new RemovedEnumMemberFinding(key, caption, root, path)
          );
        }
      }
    }

    return findings;
  }
}
