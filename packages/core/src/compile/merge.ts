/* eslint-disable complexity */
/**
 * Structural merge of two definition records.
 *
 * `merge(left, right, options)` copies fields from `right` into `left` in
 * place and returns the path of every field whose value actually changed. The walk is driven
 * by the field registry in `definitions.ts`: dictionary fields merge key by
 * key, nested parts recurse, everything else is assigned as a unit.
 */

import { deepClone, deepEqual, isRecord, unionLists } from '@taxoforge/shared';

import {
  fieldShapes,
  type Part,
  type PartKind,
} from '../repository/definitions.js';

/** Path of a changed field, e.g. `["attributes", "uid", "caption"]`. */
export type FieldPath = readonly string[];

/** A field name, or a field path matched as a prefix. */
export type FieldSelector = string | readonly string[];

export interface MergeOptions {
  /** Replace left values whenever right has one (default: false) */
  overwrite?: boolean;
  /** With `overwrite`, also replace left values when right is absent (default: false) */
  overwriteNone?: boolean;
  /** Only fields matching one of these selectors may change */
  allowedFields?: readonly FieldSelector[];
  /** Fields matching one of these selectors never change (ignored when `allowedFields` is set) */
  ignoredFields?: readonly FieldSelector[];
  /** Add dictionary entries that only exist on the right (default: true) */
  addDictItems?: boolean;
  /** Union list values instead of replacing them (default: true) */
  mergeLists?: boolean;
  /** Deep-copy right values before assigning them (default: true) */
  copy?: boolean;
}

type ResolvedMergeOptions = Required<
  Omit<MergeOptions, 'allowedFields' | 'ignoredFields'>
> &
  Pick<MergeOptions, 'allowedFields' | 'ignoredFields'>;

export const DEFAULT_MERGE_OPTIONS = {
  overwrite: false,
  overwriteNone: false,
  addDictItems: true,
  mergeLists: true,
  copy: true,
} as const satisfies MergeOptions;

export function resolveMergeOptions(
  options: MergeOptions = {}
): ResolvedMergeOptions {
  return {
    overwrite: options.overwrite ?? DEFAULT_MERGE_OPTIONS.overwrite,
    overwriteNone: options.overwriteNone ?? DEFAULT_MERGE_OPTIONS.overwriteNone,
    addDictItems: options.addDictItems ?? DEFAULT_MERGE_OPTIONS.addDictItems,
    mergeLists: options.mergeLists ?? DEFAULT_MERGE_OPTIONS.mergeLists,
    copy: options.copy ?? DEFAULT_MERGE_OPTIONS.copy,
    allowedFields: options.allowedFields,
    ignoredFields: options.ignoredFields,
  };
}

function matches(path: FieldPath, selector: FieldSelector): boolean {
  if (typeof selector === 'string') {
    return path[0] === selector;
  }
  return (
    path.length >= selector.length &&
    selector.every((segment, i) => path[i] === segment)
  );
}

/**
 * Decide whether `left` may be replaced by `right` at `path`.
 *
 * |               | right absent | right present |
 * | left absent   | overwrite+overwriteNone | yes |
 * | left present  | overwrite+overwriteNone | overwrite |
 *
 * Two lists are always merged when `mergeLists` is on. Allowed and ignored
 * field selectors gate the table.
 */
export function canUpdate(
  path: FieldPath,
  left: unknown,
  right: unknown,
  options: MergeOptions = {}
): boolean {
  const opts = resolveMergeOptions(options);

  const changeField = (): boolean => {
    if (opts.overwrite && opts.overwriteNone) return true;
    if (opts.overwrite && right != null) return true;
    if (opts.mergeLists && Array.isArray(left) && Array.isArray(right)) {
      return true;
    }
    return left == null && right != null;
  };

  if (opts.allowedFields !== undefined) {
    for (const allow of opts.allowedFields) {
      if (matches(path, allow) && changeField()) return true;
    }
    return false;
  }

  if (opts.ignoredFields !== undefined) {
    if (opts.ignoredFields.some((deny) => matches(path, deny))) return false;
  }

  return changeField();
}

function mergeRecords(
  leftKind: PartKind,
  left: Record<string, unknown>,
  rightKind: PartKind,
  right: Record<string, unknown>,
  options: ResolvedMergeOptions,
  trail: FieldPath
): FieldPath[] {
  const results: FieldPath[] = [];
  const rightShapes = fieldShapes(rightKind);

  for (const [field, shape] of Object.entries(fieldShapes(leftKind))) {
    if (!(field in rightShapes)) continue;

    const path = [...trail, field];
    const leftValue = left[field];
    const rightValue = options.copy ? deepClone(right[field]) : right[field];

    if (shape.shape === 'dict' && isRecord(leftValue) && isRecord(rightValue)) {
      if (Object.keys(rightValue).length > 0) {
        for (const [key, value] of Object.entries(rightValue)) {
          const nextPath = [...path, key];
          const existing = leftValue[key];
          if (!(key in leftValue)) {
            if (
              options.addDictItems &&
              canUpdate(nextPath, undefined, value, options)
            ) {
              leftValue[key] = value;
              results.push(nextPath);
            }
          } else if (
            shape.of !== undefined &&
            isRecord(existing) &&
            isRecord(value)
          ) {
            results.push(
              ...mergeRecords(shape.of, existing, shape.of, value, options, nextPath)
            );
          } else if (
            canUpdate(path, existing, value, options) &&
            !deepEqual(existing, value)
          ) {
            leftValue[key] = value;
            results.push(nextPath);
          }
        }
        continue;
      }
    } else if (
      Array.isArray(leftValue) &&
      Array.isArray(rightValue) &&
      options.mergeLists
    ) {
      if (canUpdate(path, leftValue, rightValue, options)) {
        const union = unionLists(leftValue, rightValue);
        if (union.length !== leftValue.length) {
          left[field] = union;
          results.push(path);
        }
      }
      continue;
    } else if (
      shape.shape === 'part' &&
      isRecord(leftValue) &&
      isRecord(rightValue)
    ) {
      results.push(
        ...mergeRecords(shape.kind, leftValue, shape.kind, rightValue, options, path)
      );
      continue;
    }

    if (
      canUpdate(path, leftValue, rightValue, options) &&
      !deepEqual(leftValue, rightValue)
    ) {
      if (rightValue === undefined) {
        delete left[field];
      } else {
        left[field] = rightValue;
      }
      results.push(path);
    }
  }

  return results;
}

/**
 * Merge `right` into `left` in place and return the changed field paths.
 * Only fields declared by both record kinds take part.
 */
export function merge(
  left: Part,
  right: Part,
  options: MergeOptions = {},
  trail: FieldPath = []
): FieldPath[] {
  return mergeRecords(
    left.kind,
    left.data,
    right.kind,
    right.data,
    resolveMergeOptions(options),
    trail
  );
}

/** Prefix every path of a merge result. */
export function prefixResults(
  prefix: FieldPath,
  results: readonly FieldPath[]
): FieldPath[] {
  return results.map((path) => [...prefix, ...path]);
}
