import { describe, it, expect } from 'vitest';

import {
  categoriesFile,
  eventFile,
  extensionFile,
  plannerContext,
  repoOf,
} from '../../../test-utils/definitions.js';
import { UidOp, UidPlanner } from '../uid.js';

const NETWORK = 'events/network/network.json';
const CIFS = 'extensions/win/events/network/cifs_activity.json';

const activity = {
  enum: { '1': { caption: 'One' }, '2': { caption: 'Two' } },
};

function repo() {
  return repoOf(
    categoriesFile({
      attributes: {
        network: { uid: 1, caption: 'Network Cat', description: 'Network Cat Desc' },
      },
    }),
    eventFile(NETWORK, {
      uid: 2,
      category: 'network',
      caption: 'Network',
      description: 'Network Desc',
      attributes: { b: { description: 'B!' }, activity_id: activity },
    }),
    eventFile(CIFS, {
      uid: 3,
      category: 'network',
      caption: 'CIFS',
      description: 'CIFS Desc',
      src_extension: 'win',
      attributes: { d: { description: 'D!' }, activity_id: activity },
    }),
    extensionFile('extensions/win/extension.json', { name: 'win', uid: 4 })
  );
}

describe('UidPlanner', () => {
  it('plans one operation per event, after categories.json', () => {
    const r = repo();
    const planner = new UidPlanner(plannerContext(r));

    const op = planner.analyze(r.require(NETWORK));
    expect(op).toBeInstanceOf(UidOp);
    expect(op).toMatchObject({ target: NETWORK, prerequisite: 'categories.json' });

    expect(planner.analyze(r.require(CIFS))).toMatchObject({ target: CIFS });
    expect(planner.analyze(r.require('extensions/win/extension.json'))).toBeUndefined();
  });

  it('skips extension amendments of core events', () => {
    const r = repo();
    r.set(
      'extensions/win/events/network/network.json',
      eventFile('extensions/win/events/network/network.json', { caption: 'Amended' })
    );
    const planner = new UidPlanner(plannerContext(r));
    expect(planner.analyze(r.require('extensions/win/events/network/network.json'))).toBeUndefined();
  });
});

describe('UidOp', () => {
  it('derives category, class and type uids', () => {
    const context = plannerContext(repo());
    const results = new UidOp(NETWORK).apply(context.schema);

    expect(results).toEqual([
      ['attributes', 'category_uid'],
      ['attributes', 'class_uid'],
      ['attributes', 'type_uid'],
      ['uid'],
    ]);

    const event = context.schema.narrow(NETWORK, 'event').data;
    expect(event.uid).toBe(1002);
    expect(event.attributes?.category_uid).toEqual({
      enum: { '1': { caption: 'Network Cat', description: 'Network Cat Desc' } },
    });
    expect(event.attributes?.class_uid).toEqual({
      enum: { '1002': { caption: 'Network', description: 'Network Desc' } },
    });
    expect(event.attributes?.type_uid).toEqual({
      enum: {
        '100201': { caption: 'Network: One' },
        '100202': { caption: 'Network: Two' },
      },
    });
  });

  it('offsets extension events by the extension uid', () => {
    const context = plannerContext(repo());
    new UidOp(CIFS).apply(context.schema);

    const event = context.schema.narrow(CIFS, 'event').data;
    expect(event.uid).toBe(401003);
    expect(event.attributes?.type_uid).toEqual({
      enum: {
        '40100301': { caption: 'CIFS: One' },
        '40100302': { caption: 'CIFS: Two' },
      },
    });
  });

  it('replaces uid members inherited from the base event', () => {
    const r = repoOf(
      categoriesFile({ attributes: { network: { uid: 1, caption: 'Network' } } }),
      eventFile(NETWORK, {
        uid: 2,
        category: 'network',
        caption: 'Network',
        attributes: {
          class_uid: { caption: 'Class ID', enum: { '0': { caption: 'Base Event' } } },
        },
      })
    );
    const context = plannerContext(r);
    new UidOp(NETWORK).apply(context.schema);

    const event = context.schema.narrow(NETWORK, 'event').data;
    expect(event.attributes?.class_uid).toEqual({
      caption: 'Class ID',
      enum: { '1002': { caption: 'Network' } },
    });
  });

  it('gives the base event uid 0', () => {
    const r = repoOf(
      categoriesFile({ attributes: {} }),
      eventFile('events/base_event.json', {
        name: 'base_event',
        caption: 'Base Event',
        category: 'other',
        attributes: {},
      })
    );
    const context = plannerContext(r);
    new UidOp('events/base_event.json').apply(context.schema);

    const event = context.schema.narrow('events/base_event.json', 'event').data;
    expect(event.uid).toBe(0);
    expect(event.attributes?.class_uid).toEqual({ enum: { '0': { caption: 'Base Event' } } });
  });

  it('fails when the source extension is unknown', () => {
    const r = repo();
    r.delete('extensions/win/extension.json');
    const context = plannerContext(r);
    expect(() => new UidOp(CIFS).apply(context.schema)).toThrow(
      `Extension win not found for ${CIFS}`
    );
  });
});
