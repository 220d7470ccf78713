import { describe, it, expect } from 'vitest';
import type { Mutation, Operation } from '@taxoforge/core';

import { renderMutations, renderOperations } from './debug.js';

function op(target: string, description: string): Operation {
  return { target, apply: () => [], describe: () => description };
}

describe('renderOperations', () => {
  it('prints one description per operation', () => {
    expect(
      renderOperations([op('objects/user.json', 'Dictionary objects/user.json <- dictionary.json')])
    ).toEqual(['Dictionary objects/user.json <- dictionary.json']);
  });
});

describe('renderMutations', () => {
  it('lists changed field paths under each operation', () => {
    const mutations: Mutation[] = [
      {
        operation: op('events/ping.json', 'Assign category to events/ping.json'),
        changes: [['category']],
      },
      {
        operation: op('events/ping.json', 'UIDs for events/ping.json'),
        changes: [['uid'], ['attributes', 'class_uid', 'enum']],
      },
    ];
    expect(renderMutations(mutations)).toEqual([
      'Assign category to events/ping.json',
      '  category',
      '',
      'UIDs for events/ping.json',
      '  uid',
      '  attributes.class_uid.enum',
      '',
    ]);
  });
});
