import type { CompilationOptions, FindingSeverity } from '@taxoforge/core';

/**
 * Compilation flags as commander parses them. Negatable flags are declared
 * in both forms, so they stay undefined unless given.
 */
export interface CompileFlags {
  profile?: string[];
  ignoreProfile?: string[];
  extension?: string[];
  ignoreExtension?: string[];
  prefixExtensions?: boolean;
  setObjectTypes?: boolean;
  setObservable?: boolean;
  mapEventsToCategories?: boolean;
}

/** Map compile flags onto compilation options, leaving unset flags to the defaults. */
export function parseCompilationOptions(flags: CompileFlags): CompilationOptions {
  const options: CompilationOptions = {};

  if (flags.profile !== undefined) options.profiles = flags.profile;
  if (flags.ignoreProfile !== undefined) options.ignoreProfiles = flags.ignoreProfile;
  if (flags.extension !== undefined) options.extensions = flags.extension;
  if (flags.ignoreExtension !== undefined) options.ignoreExtensions = flags.ignoreExtension;

  if (typeof flags.prefixExtensions === 'boolean') {
    options.prefixExtensions = flags.prefixExtensions;
  }
  if (typeof flags.setObjectTypes === 'boolean') {
    options.setObjectTypes = flags.setObjectTypes;
  }
  if (typeof flags.setObservable === 'boolean') {
    options.setObservable = flags.setObservable;
  }
  if (typeof flags.mapEventsToCategories === 'boolean') {
    options.mapEventsToCategories = flags.mapEventsToCategories;
  }

  return options;
}

export type SeverityFlags = Partial<Record<FindingSeverity, string[]>>;

const FLAG_ORDER: readonly FindingSeverity[] = ['info', 'warning', 'error', 'fatal'];

/**
 * Severity overrides from `--info`, `--warning`, `--error` and `--fatal`.
 * A finding named under several flags takes the most severe one.
 */
export function parseSeverityFlags(flags: SeverityFlags): Record<string, FindingSeverity> {
  const severities: Record<string, FindingSeverity> = {};
  for (const severity of FLAG_ORDER) {
    for (const finding of flags[severity] ?? []) {
      severities[finding] = severity;
    }
  }
  return severities;
}
